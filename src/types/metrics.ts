/**
 * Inclusive year range used to scope aggregate metrics.
 */
export interface PeriodWindow {
    /** Display label, e.g. "10-Year (2015-2024)". Derived from the years when omitted. */
    label?: string;
    startYear: number;
    endYear: number;
}

/**
 * Trainee totals, one entry per configured category (phd, masters, ...).
 */
export interface TraineeCounts {
    byCategory: Record<string, number>;
    total: number;
}

/**
 * Ratios derived from the window totals. Zero whenever the denominator is zero.
 */
export interface EfficiencyMetrics {
    traineesPerProject: number;
    investmentPerProject: number;
    investmentPerTrainee: number;
}

/**
 * Aggregate metrics for one window (and optionally one track).
 * Always a pure function of the entity set, the window and the selectors.
 */
export interface AggregateMetrics {
    window: Required<PeriodWindow>;

    /** Track name the entities were filtered by, or null for no filter */
    track: string | null;

    /** Unique projects (entities, never raw records) in the window */
    projectCount: number;

    /** Σ of each entity's canonical investment amount */
    investment: number;

    /** Σ of each entity's canonical follow-on amount */
    followOnFunding: number;

    /** followOnFunding / investment, or 0 when investment is 0 */
    roi: number;

    trainees: TraineeCounts;

    /** Distinct canonical institution labels */
    distinctInstitutions: number;

    efficiency: EfficiencyMetrics;

    /** Distinct outcome descriptions per outcome category */
    outcomes: Record<string, number>;

    /** Entities left out because their identifier yielded no year */
    excludedUnextractable: number;

    /** Ratios that fell back to zero because their denominator was zero */
    emptyDenominators: string[];
}

/**
 * One row of a distribution table (by award type, by institution, ...).
 */
export interface BreakdownRow {
    value: string;
    projects: number;
    investment: number;
    followOnFunding: number;
}

export interface Breakdown {
    window: Required<PeriodWindow>;
    track: string | null;
    field: string;
    rows: BreakdownRow[];
}

export interface TrackComparison {
    window: Required<PeriodWindow>;
    left: AggregateMetrics;
    right: AggregateMetrics;
}
