import { describe, it, expect } from 'vitest';
import { aggregateMetrics, classifyOutcome, compareTracks, computeBreakdown } from '../metrics/aggregator.js';
import { resolveEntities } from '../resolver/entity-resolver.js';
import { ConfigurationError } from '../utils/errors.js';
import type { ProjectEntity, RawRecord } from '../types/index.js';
import { defaultCompiledConfig, record } from './fixtures.js';

const config = defaultCompiledConfig();

const records: RawRecord[] = [
    record({
        projectId: '2020IL103AIS',
        awardType: '104g - AIS',
        awardAmount: 100000,
        monetaryBenefit: '$7,000',
        institution: 'UIUC',
        phdStudents: '2',
        msStudents: '1',
        awardsGrants: 'NSF Grant',
    }, 1),
    record({ projectId: '2020IL103AIS', awardType: '104g - AIS', awardAmount: 100000, awardsGrants: 'Best Paper Award' }, 2),
    record({ projectId: '2020IL103AIS', awardType: '104g - AIS', awardAmount: 100000 }, 3),
    record({
        projectId: '2018IL001B',
        awardType: 'Base Grant (104b)',
        awardAmount: 50000,
        monetaryBenefit: 'NA',
        institution: 'University of Illinois',
        undergradStudents: '3',
    }, 4),
    record({ projectId: 'ILXX-01', awardAmount: 30000 }, 5),
];

const { entities } = resolveEntities(records, config);
const decade = { label: '10-Year (2015-2024)', startYear: 2015, endYear: 2024 };

describe('aggregateMetrics', () => {
    it('should sum one canonical value per entity', () => {
        const metrics = aggregateMetrics(entities, decade, config);

        expect(metrics.projectCount).toBe(2);
        expect(metrics.investment).toBe(150000);
        expect(metrics.followOnFunding).toBe(7000);
        expect(metrics.roi).toBeCloseTo(7000 / 150000, 10);

        // Raw records would have counted the 2020 project three times
        const rawSum = records
            .slice(0, 4)
            .reduce((sum, r) => {
                const amount = r.values['awardAmount'];
                return sum + (typeof amount === 'number' ? amount : 0);
            }, 0);
        expect(rawSum).toBe(350000);
        expect(metrics.investment).not.toBe(rawSum);
    });

    it('should count trainees, institutions and outcomes', () => {
        const metrics = aggregateMetrics(entities, decade, config);

        expect(metrics.trainees).toEqual({ byCategory: { phd: 2, masters: 1, undergrad: 3, postdoc: 0 }, total: 6 });
        expect(metrics.distinctInstitutions).toBe(1);
        expect(metrics.efficiency).toEqual({
            traineesPerProject: 3,
            investmentPerProject: 75000,
            investmentPerTrainee: 25000,
        });
        expect(metrics.outcomes).toEqual({ Grant: 1, Award: 1, Achievement: 0, Other: 0 });
    });

    it('should exclude unextractable years from windows only', () => {
        const metrics = aggregateMetrics(entities, decade, config);

        expect(entities).toHaveLength(3);
        expect(metrics.excludedUnextractable).toBe(1);
        expect(metrics.window).toEqual(decade);
        expect(metrics.track).toBeNull();
    });

    it('should filter by track', () => {
        const window = { startYear: 2020, endYear: 2024 };
        const metrics = aggregateMetrics(entities, window, config, '104g');

        expect(metrics.window.label).toBe('2020-2024');
        expect(metrics.track).toBe('104g');
        expect(metrics.projectCount).toBe(1);
        expect(metrics.investment).toBe(100000);
        expect(metrics.roi).toBe(0.07);
    });

    it('should match tracks by exact value', () => {
        const metrics = aggregateMetrics(entities, decade, config, '104b');

        expect(metrics.projectCount).toBe(1);
        expect(metrics.investment).toBe(50000);
        expect(metrics.roi).toBe(0);
        expect(metrics.emptyDenominators).toEqual([]);
    });

    it('should return zero ratios for an empty window', () => {
        const metrics = aggregateMetrics(entities, { startYear: 2000, endYear: 2005 }, config);

        expect(metrics.projectCount).toBe(0);
        expect(metrics.roi).toBe(0);
        expect(metrics.efficiency).toEqual({ traineesPerProject: 0, investmentPerProject: 0, investmentPerTrainee: 0 });
        expect(metrics.emptyDenominators).toEqual([
            'roi',
            'traineesPerProject',
            'investmentPerProject',
            'investmentPerTrainee',
        ]);
    });

    it('should give ROI 0 when investment is 0', () => {
        const { entities: unfunded } = resolveEntities(
            [record({ projectId: '2021IL9', awardAmount: 'NA', monetaryBenefit: '$500' })],
            config
        );
        const metrics = aggregateMetrics(unfunded, { startYear: 2021, endYear: 2021 }, config);

        expect(metrics.followOnFunding).toBe(500);
        expect(metrics.roi).toBe(0);
        expect(metrics.emptyDenominators).toContain('roi');
    });

    it('should reject unknown tracks', () => {
        expect(() => aggregateMetrics(entities, decade, config, 'nope')).toThrow(ConfigurationError);
    });

    it('should be identical for shuffled entity lists', () => {
        const shuffled = [entities[2], entities[0], entities[1]].filter((e): e is ProjectEntity => e !== undefined);
        expect(aggregateMetrics(shuffled, decade, config)).toEqual(aggregateMetrics(entities, decade, config));
    });
});

describe('computeBreakdown', () => {
    it('should group by field value, largest investment first', () => {
        const breakdown = computeBreakdown(entities, decade, 'awardType', config);

        expect(breakdown.field).toBe('awardType');
        expect(breakdown.rows).toEqual([
            { value: '104g - AIS', projects: 1, investment: 100000, followOnFunding: 7000 },
            { value: 'Base Grant (104b)', projects: 1, investment: 50000, followOnFunding: 0 },
        ]);
    });
});

describe('compareTracks', () => {
    it('should aggregate both tracks for the same window', () => {
        const comparison = compareTracks(entities, decade, config, '104b', '104g');

        expect(comparison.left.investment).toBe(50000);
        expect(comparison.right.investment).toBe(100000);
        expect(comparison.window).toEqual(decade);
    });
});

describe('classifyOutcome', () => {
    it('should use the first matching category', () => {
        expect(classifyOutcome('Grant award from USGS', config.outcomeCategories)).toBe('Grant');
        expect(classifyOutcome('Achievement unlocked', config.outcomeCategories)).toBe('Achievement');
        expect(classifyOutcome('Patent filed', config.outcomeCategories)).toBe('Other');
    });
});
