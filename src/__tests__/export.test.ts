import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { exportReport, renderReport, type ReportData } from '../exporters/export.js';
import { validateQuality } from '../quality/validator.js';
import type { AggregateMetrics, CanonicalField } from '../types/index.js';

const metrics: AggregateMetrics = {
    window: { label: '5-Year (2020-2024)', startYear: 2020, endYear: 2024 },
    track: null,
    projectCount: 2,
    investment: 150000,
    followOnFunding: 7500,
    roi: 0.05,
    trainees: { byCategory: { phd: 2, masters: 1 }, total: 3 },
    distinctInstitutions: 1,
    efficiency: { traineesPerProject: 1.5, investmentPerProject: 75000, investmentPerTrainee: 50000 },
    outcomes: { Grant: 1, Other: 0 },
    excludedUnextractable: 0,
    emptyDenominators: [],
};

const data: ReportData = {
    metrics: [metrics, { ...metrics, window: { label: 'A, B', startYear: 2021, endYear: 2021 }, track: '104b' }],
    breakdowns: [
        {
            window: metrics.window,
            track: null,
            field: 'institution',
            rows: [
                { value: 'University of Illinois at Urbana-Champaign', projects: 1, investment: 100000, followOnFunding: 7500 },
                { value: 'A | B', projects: 1, investment: 50000, followOnFunding: 0 },
            ],
        },
    ],
    quality: validateQuality({
        entities: [],
        keyedRecordCount: 0,
        recordsWithoutIdentifier: 0,
        unmappedHeaders: [],
        windows: [],
        fields: new Map<string, CanonicalField>(),
    }),
};

describe('renderReport', () => {
    it('should render one CSV row per window metric', () => {
        const lines = renderReport(data, 'csv').split('\n');

        expect(lines[0]).toBe(
            'window,start_year,end_year,track,projects,investment,follow_on_funding,roi,trainees_phd,trainees_masters,' +
            'trainees_total,distinct_institutions,trainees_per_project,investment_per_project,investment_per_trainee,excluded_unextractable'
        );
        expect(lines[1]).toBe('5-Year (2020-2024),2020,2024,,2,150000,7500,0.05,2,1,3,1,1.5,75000,50000,0');
        expect(lines[2]).toBe('"A, B",2021,2021,104b,2,150000,7500,0.05,2,1,3,1,1.5,75000,50000,0');
        expect(lines).toHaveLength(4);
    });

    it('should render JSON with metrics and quality', () => {
        const parsed: unknown = JSON.parse(renderReport(data, 'json'));

        expect(parsed).toMatchObject({
            fundmetrics: { version: '1.0.0' },
            metrics: [{ investment: 150000, roi: 0.05 }, { track: '104b' }],
            breakdowns: [{ field: 'institution', rows: [{ projects: 1 }, { value: 'A | B' }] }],
            quality: { entityCount: 0, duplicationFactor: 0 },
        });
    });

    it('should render Markdown tables', () => {
        const lines = renderReport(data, 'markdown').split('\n');

        expect(lines[0]).toBe('# Funding Metrics Report');
        expect(lines).toContain('## 5-Year (2020-2024)');
        expect(lines).toContain('## A, B [104b]');
        expect(lines).toContain('| Investment | $150,000.00 |');
        expect(lines).toContain('| ROI | 0.0500 |');
        expect(lines).toContain('| Trainees (phd) | 2 |');
        expect(lines).toContain('| Investment per trainee | $50,000.00 |');
        expect(lines).toContain('## institution breakdown: 5-Year (2020-2024)');
        expect(lines).toContain('| University of Illinois at Urbana-Champaign | 1 | $100,000.00 | $7,500.00 |');
        expect(lines).toContain('| A \\| B | 1 | $50,000.00 | $0.00 |');
        expect(lines).toContain('## Data Quality');
        expect(lines).toContain('| Duplication factor | 0.00 |');
        expect(lines).toContain('| UnmappedHeader | 0 |');
    });
});

describe('exportReport', () => {
    it('should write the rendered report to a file', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fundmetrics-export-'));
        const file = path.join(dir, 'report.md');

        exportReport(data, file, 'markdown');

        expect(fs.readFileSync(file, 'utf-8')).toBe(renderReport(data, 'markdown'));
        fs.rmSync(dir, { recursive: true, force: true });
    });
});
