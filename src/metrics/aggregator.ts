import type {
    AggregateMetrics,
    Breakdown,
    BreakdownRow,
    CompiledConfig,
    OutcomeCategory,
    PeriodWindow,
    ProjectEntity,
    TrackComparison,
} from '../types/index.js';
import { windowLabel } from '../utils/config.js';
import { stageLogger } from '../utils/logger.js';
import { normalizeLabel } from '../utils/text.js';
import { matchesTrack, resolveTrack } from './tracks.js';

/** Label for outcome descriptions no category claims */
export const OTHER_OUTCOME = 'Other';

/** Breakdown label for entities with no value in the grouped field */
export const NO_VALUE = '(none)';

export type MetricsConfig = Pick<CompiledConfig, 'metrics' | 'outcomeCategories' | 'tracks'>;

// ─── Helpers ─────────────────────────────────────────────

function byKey(a: ProjectEntity, b: ProjectEntity): number {
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function amountOf(entity: ProjectEntity, field: string): number {
    const value = entity.fields[field];
    return typeof value === 'number' ? value : 0;
}

function fullWindow(window: PeriodWindow): Required<PeriodWindow> {
    return { label: windowLabel(window), startYear: window.startYear, endYear: window.endYear };
}

export function inWindow(entity: ProjectEntity, window: PeriodWindow): boolean {
    return entity.year !== null && entity.year >= window.startYear && entity.year <= window.endYear;
}

/**
 * Entities inside the window (and track), in key order. Unextractable years
 * are counted separately; they never fall inside a window.
 */
function selectEntities(
    entities: readonly ProjectEntity[],
    window: PeriodWindow,
    config: MetricsConfig,
    trackName?: string
): { selected: ProjectEntity[]; unextractable: number } {
    const track = trackName === undefined ? null : resolveTrack(trackName, config.tracks);
    const ordered = [...entities].sort(byKey);

    return {
        selected: ordered.filter((entity) => inWindow(entity, window) && (track === null || matchesTrack(entity, track))),
        unextractable: ordered.filter((entity) => entity.year === null).length,
    };
}

/**
 * First category with a keyword contained in the description, else "Other".
 */
export function classifyOutcome(description: string, categories: readonly OutcomeCategory[]): string {
    const text = description.toLowerCase();
    for (const category of categories) {
        if (category.keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
            return category.label;
        }
    }
    return OTHER_OUTCOME;
}

function countOutcomes(entities: readonly ProjectEntity[], config: MetricsConfig): Record<string, number> {
    const field = config.metrics.outcomeField;
    if (field === undefined) return {};

    const outcomes: Record<string, number> = {};
    for (const category of config.outcomeCategories) outcomes[category.label] = 0;
    outcomes[OTHER_OUTCOME] = 0;

    // Distinct descriptions across entities, so an outcome echoed by two projects counts once
    const seen = new Set<string>();
    for (const entity of entities) {
        const display = entity.fields[field];
        const descriptions = entity.variants[field] ?? (typeof display === 'string' ? [display] : []);
        for (const description of descriptions) {
            const key = normalizeLabel(description);
            if (seen.has(key)) continue;
            seen.add(key);
            const label = classifyOutcome(description, config.outcomeCategories);
            outcomes[label] = (outcomes[label] ?? 0) + 1;
        }
    }
    return outcomes;
}

// ─── Aggregation ─────────────────────────────────────────

/**
 * Aggregate metrics for one window, optionally restricted to a track.
 *
 * Every sum runs over entities, one canonical value each, in key order.
 * Ratios with a zero denominator are 0 and listed in `emptyDenominators`.
 */
export function aggregateMetrics(
    entities: readonly ProjectEntity[],
    window: PeriodWindow,
    config: MetricsConfig,
    trackName?: string
): AggregateMetrics {
    const { selected, unextractable } = selectEntities(entities, window, config, trackName);
    const selectors = config.metrics;

    let investment = 0;
    let followOnFunding = 0;
    const byCategory: Record<string, number> = {};
    for (const label of Object.keys(selectors.trainees)) byCategory[label] = 0;
    const institutions = new Set<string>();

    for (const entity of selected) {
        investment += amountOf(entity, selectors.investmentField);
        followOnFunding += amountOf(entity, selectors.followOnField);
        for (const [label, field] of Object.entries(selectors.trainees)) {
            byCategory[label] = (byCategory[label] ?? 0) + amountOf(entity, field);
        }
        const institution = entity.fields[selectors.institutionField];
        if (typeof institution === 'string') institutions.add(normalizeLabel(institution));
    }

    const traineeTotal = Object.values(byCategory).reduce((sum, count) => sum + count, 0);
    const projectCount = selected.length;

    const emptyDenominators: string[] = [];
    const ratio = (name: string, numerator: number, denominator: number): number => {
        if (denominator === 0) {
            emptyDenominators.push(name);
            return 0;
        }
        return numerator / denominator;
    };

    const metrics: AggregateMetrics = {
        window: fullWindow(window),
        track: trackName ?? null,
        projectCount,
        investment,
        followOnFunding,
        roi: ratio('roi', followOnFunding, investment),
        trainees: { byCategory, total: traineeTotal },
        distinctInstitutions: institutions.size,
        efficiency: {
            traineesPerProject: ratio('traineesPerProject', traineeTotal, projectCount),
            investmentPerProject: ratio('investmentPerProject', investment, projectCount),
            investmentPerTrainee: ratio('investmentPerTrainee', investment, traineeTotal),
        },
        outcomes: countOutcomes(selected, config),
        excludedUnextractable: unextractable,
        emptyDenominators,
    };

    stageLogger('metrics').debug(
        { window: metrics.window.label, track: metrics.track, projects: projectCount, investment, roi: metrics.roi },
        'Window aggregated'
    );

    return metrics;
}

/**
 * Distribution of projects and funding over the values of one field
 * (award type, institution, ...), largest investment first.
 */
export function computeBreakdown(
    entities: readonly ProjectEntity[],
    window: PeriodWindow,
    field: string,
    config: MetricsConfig,
    trackName?: string
): Breakdown {
    const { selected } = selectEntities(entities, window, config, trackName);
    const rows = new Map<string, BreakdownRow>();

    for (const entity of selected) {
        const raw = entity.fields[field];
        const value = raw === null || raw === undefined ? NO_VALUE : String(raw);
        const row = rows.get(value) ?? { value, projects: 0, investment: 0, followOnFunding: 0 };
        row.projects++;
        row.investment += amountOf(entity, config.metrics.investmentField);
        row.followOnFunding += amountOf(entity, config.metrics.followOnField);
        rows.set(value, row);
    }

    return {
        window: fullWindow(window),
        track: trackName ?? null,
        field,
        rows: [...rows.values()].sort(
            (a, b) => b.investment - a.investment || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0)
        ),
    };
}

/**
 * Two tracks' metrics for the same window, side by side.
 */
export function compareTracks(
    entities: readonly ProjectEntity[],
    window: PeriodWindow,
    config: MetricsConfig,
    left: string,
    right: string
): TrackComparison {
    return {
        window: fullWindow(window),
        left: aggregateMetrics(entities, window, config, left),
        right: aggregateMetrics(entities, window, config, right),
    };
}
