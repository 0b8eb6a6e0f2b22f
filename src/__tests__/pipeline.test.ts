import { describe, it, expect } from 'vitest';
import { runPipeline } from '../pipeline/run-pipeline.js';
import { ConfigurationError } from '../utils/errors.js';
import type { SourceTable } from '../types/index.js';
import { defaultCompiledConfig } from './fixtures.js';

const config = defaultCompiledConfig();
const KEY = '2020IL103AIS';

const annual: SourceTable = {
    source: 'FY21_reporting.csv',
    headers: [
        'Project ID',
        'Award Type',
        'Award Amount Allocated ($) this must be filled in for all lines',
        'Monetary Benefit of Award or Achievement (if applicable; use NA if not applicable)',
        'Academic Institution of PI',
    ],
    rows: [
        [KEY, '104g - AIS', '$100,000', 'NA', 'UIUC'],
        [KEY, '104g - AIS', '$100,000', '$7,000 EPA grant', 'UIUC'],
        [KEY, '104g - AIS', '$100,000', 'NA', 'University of Illinois'],
        [KEY, '104g - AIS', '$100,000', 'NA', 'UIUC'],
        [KEY, '104g - AIS', '$100,000', 'NA', 'UIUC'],
        [KEY, '104g - AIS', '$100,000', 'NA', 'UIUC'],
    ],
};

const followUp: SourceTable = {
    source: 'FY22_reporting.csv',
    headers: ['Project ID ', 'Award Amount', 'Notes'],
    rows: [
        [KEY, '100000', 'publication'],
        [KEY, '100000', 'thesis'],
        [KEY, '100000', 'presentation'],
    ],
};

const window2020 = { label: 'FY2020', startYear: 2020, endYear: 2020 };

describe('runPipeline', () => {
    it('should count a project reported on nine rows once', () => {
        const result = runPipeline([annual, followUp], config, { windows: [window2020] });

        expect(result.entities).toHaveLength(1);
        expect(result.metrics).toHaveLength(1);

        const [metrics] = result.metrics;
        expect(metrics?.projectCount).toBe(1);
        expect(metrics?.investment).toBe(100000);
        expect(metrics?.followOnFunding).toBe(7000);
        expect(metrics?.roi).toBe(0.07);
        expect(metrics?.distinctInstitutions).toBe(1);

        expect(result.quality.rawRecordCount).toBe(9);
        expect(result.quality.duplicationFactor).toBe(9);
        expect(result.entities[0]?.amountProvenance['monetaryBenefit']).toBe('summed-from-text');
    });

    it('should report unmapped headers alongside the metrics', () => {
        const result = runPipeline([annual, followUp], config, { windows: [window2020] });

        expect(result.quality.unmappedHeaders).toEqual([
            { kind: 'UnmappedHeader', source: 'FY22_reporting.csv', header: 'Notes', column: 2, reason: 'no-match' },
        ]);
        // No trainees were reported, so investment per trainee has an empty denominator
        expect(result.issues.map((issue) => issue.kind)).toEqual(['UnmappedHeader', 'EmptyDenominator']);
    });

    it('should aggregate every configured window when none are given', () => {
        const result = runPipeline([annual], config);

        expect(result.metrics.map((m) => m.window.label)).toEqual(['10-Year (2015-2024)', '5-Year (2020-2024)']);
    });

    it('should aggregate each requested track per window', () => {
        const result = runPipeline([annual], config, { windows: [window2020], tracks: ['104b', '104g-ais'] });

        expect(result.metrics.map((m) => [m.track, m.projectCount])).toEqual([
            ['104b', 0],
            ['104g-ais', 1],
        ]);
        expect(result.metrics[0]?.emptyDenominators).toHaveLength(4);
        expect(result.metrics[1]?.emptyDenominators).toEqual(['investmentPerTrainee']);
        expect(result.issues.filter((issue) => issue.kind === 'EmptyDenominator')).toHaveLength(5);
    });

    it('should break each window down by the configured fields', () => {
        const result = runPipeline([annual], config, { windows: [window2020] });

        expect(result.breakdowns).toEqual([
            {
                window: window2020,
                track: null,
                field: 'awardType',
                rows: [{ value: '104g - AIS', projects: 1, investment: 100000, followOnFunding: 7000 }],
            },
            {
                window: window2020,
                track: null,
                field: 'institution',
                rows: [{ value: 'University of Illinois at Urbana-Champaign', projects: 1, investment: 100000, followOnFunding: 7000 }],
            },
            {
                window: window2020,
                track: null,
                field: 'sciencePriority',
                rows: [{ value: '(none)', projects: 1, investment: 100000, followOnFunding: 7000 }],
            },
        ]);
    });

    it('should break down each requested track by the requested fields', () => {
        const result = runPipeline([annual], config, {
            windows: [window2020],
            tracks: ['104b', '104g-ais'],
            breakdowns: ['awardType'],
        });

        expect(result.breakdowns.map((b) => [b.track, b.field, b.rows.length])).toEqual([
            ['104b', 'awardType', 0],
            ['104g-ais', 'awardType', 1],
        ]);
    });

    it('should give identical results whatever the source order', () => {
        const forward = runPipeline([annual, followUp], config, { windows: [window2020] });
        const reversed = runPipeline([followUp, annual], config, { windows: [window2020] });

        expect(reversed.entities).toEqual(forward.entities);
        expect(reversed.metrics).toEqual(forward.metrics);
    });

    it('should reject bad requests before processing', () => {
        expect(() => runPipeline([annual], config, { windows: [{ startYear: 2024, endYear: 2015 }] })).toThrow(
            ConfigurationError
        );
        expect(() => runPipeline([annual], config, { tracks: ['unknown'] })).toThrow(/unknown track "unknown"/);
        expect(() => runPipeline([annual], config, { breakdowns: ['budget'] })).toThrow(ConfigurationError);
    });

    it('should not throw on malformed data', () => {
        const messy: SourceTable = {
            source: 'messy.csv',
            headers: ['', 'Project ID', 'Award Amount'],
            rows: [
                [null, null, 'TBD'],
                ['x', 'no year here', 'lots'],
                [],
            ],
        };
        const result = runPipeline([messy], config, { windows: [window2020] });

        expect(result.quality.recordsWithoutIdentifier).toBe(1);
        expect(result.quality.unextractableIdentifiers).toEqual(['no year here']);
        expect(result.quality.issueCounts.UnparsedValue).toBe(1);
    });
});
