import type { AggregationPolicy, CanonicalField, FieldDefinition } from './field.js';
import type { PeriodWindow } from './metrics.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * One year-extraction rule. Rules are tried in order; the first that
 * yields an in-range year wins.
 */
export interface YearPatternRule {
    name: string;
    /** Regular expression source; capture group 1 is used when present */
    pattern: string;
    flags?: string;
    /** Added to the captured number (two-digit fiscal years) */
    century?: number;
    minYear: number;
    maxYear: number;
}

/**
 * Which canonical fields feed the aggregate metrics.
 */
export interface MetricSelectors {
    investmentField: string;
    followOnField: string;
    institutionField: string;
    /** Trainee category label → count field */
    trainees: Record<string, string>;
    /** UNION field whose descriptions are classified into outcome categories */
    outcomeField?: string;
}

/**
 * Outcome classification rule; the first category with a matching keyword wins.
 */
export interface OutcomeCategory {
    label: string;
    keywords: string[];
}

/**
 * Named entity filter (award-type track). No `field` means "everything".
 */
export interface TrackDefinition {
    label: string;
    field?: string;
    equals?: string[];
    contains?: string;
}

/**
 * Full configuration, merged from CLI flags, environment and config file
 * over `config/default.json`.
 */
export interface FundMetricsConfig {
    /** Canonical field holding the entity identifier */
    keyField: string;

    /** (a) Header-alias table: canonical field → known literal headers */
    headerAliases: Record<string, string[]>;

    /** (b) Policy table */
    fields: Record<string, FieldDefinition>;

    /** (c) Controlled-vocabulary alias tables: table → variant → canonical label */
    aliasTables: Record<string, Record<string, string>>;

    /** (d) Ordered year-extraction rules */
    yearPatterns: YearPatternRule[];

    sentinels: string[];
    headerStopwords: string[];
    metrics: MetricSelectors;
    outcomeCategories: OutcomeCategory[];
    tracks: Record<string, TrackDefinition>;
    windows: PeriodWindow[];

    /** Fields whose value distribution is reported per window */
    breakdowns: string[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export interface CompiledYearRule {
    name: string;
    regex: RegExp;
    century?: number;
    minYear: number;
    maxYear: number;
}

/**
 * Validated, frozen configuration used by every pipeline stage.
 * Built once at startup by `compileConfig()`.
 */
export interface CompiledConfig {
    readonly keyField: string;

    /** Canonical fields in declaration order */
    readonly fields: ReadonlyMap<string, CanonicalField>;

    /** Canonical field → normalized literal headers */
    readonly headerAliases: ReadonlyMap<string, readonly string[]>;

    /** Table → normalized variant → canonical label */
    readonly aliasTables: ReadonlyMap<string, ReadonlyMap<string, string>>;

    readonly yearRules: readonly CompiledYearRule[];

    /** Upper-cased sentinel strings */
    readonly sentinels: ReadonlySet<string>;
    readonly headerStopwords: ReadonlySet<string>;

    readonly metrics: Readonly<MetricSelectors>;
    readonly outcomeCategories: readonly OutcomeCategory[];
    readonly tracks: ReadonlyMap<string, TrackDefinition>;
    readonly windows: readonly Required<PeriodWindow>[];
    readonly breakdowns: readonly string[];

    /** Field name → policy, handy for logging */
    policyOf(field: string): AggregationPolicy | undefined;
}
