import { readFileSync } from 'node:fs';
import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import type {
    AggregationPolicy,
    CanonicalField,
    CompiledConfig,
    CompiledYearRule,
    FieldType,
    FundMetricsConfig,
    PeriodWindow,
} from '../types/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { getLogger, envLogLevel } from './logger.js';
import { normalizeLabel } from './text.js';

// ─── Schemas ─────────────────────────────────────────────

const fieldDefinitionSchema = z
    .object({
        type: z.enum(['string', 'currency', 'count']),
        policy: z.enum(['IDENTITY', 'SUM_SAFE', 'MAX_OF_PARSED', 'UNION']),
        adjacentField: z.string().min(1).optional(),
        textFallbackFields: z.array(z.string().min(1)).optional(),
        aliasTable: z.string().min(1).optional(),
    })
    .strict();

const yearPatternSchema = z.object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, 'only the i, m, s and u flags are allowed').optional(),
    century: z.number().int().nonnegative().optional(),
    minYear: z.number().int(),
    maxYear: z.number().int(),
});

const windowSchema = z.object({
    label: z.string().min(1).optional(),
    startYear: z.number().int(),
    endYear: z.number().int(),
});

const metricsSchema = z.object({
    investmentField: z.string().min(1),
    followOnField: z.string().min(1),
    institutionField: z.string().min(1),
    trainees: z.record(z.string().min(1)),
    outcomeField: z.string().min(1).optional(),
});

const trackSchema = z.object({
    label: z.string().min(1),
    field: z.string().min(1).optional(),
    equals: z.array(z.string()).optional(),
    contains: z.string().min(1).optional(),
});

const configSchema = z.object({
    keyField: z.string().min(1),
    headerAliases: z.record(z.array(z.string())),
    fields: z.record(fieldDefinitionSchema),
    aliasTables: z.record(z.record(z.string())),
    yearPatterns: z.array(yearPatternSchema).min(1),
    sentinels: z.array(z.string()),
    headerStopwords: z.array(z.string()),
    metrics: metricsSchema,
    outcomeCategories: z.array(z.object({ label: z.string().min(1), keywords: z.array(z.string().min(1)).min(1) })),
    tracks: z.record(trackSchema),
    windows: z.array(windowSchema),
    breakdowns: z.array(z.string().min(1)),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

const partialConfigSchema = configSchema.extend({ metrics: metricsSchema.partial() }).partial();

/**
 * Configuration fragment as read from a config file. Table entries merge
 * per key over the defaults; arrays and scalars replace.
 */
export type PartialFundMetricsConfig = z.infer<typeof partialConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ─── Loading ─────────────────────────────────────────────

const DEFAULT_CONFIG_URL = new URL('../../config/default.json', import.meta.url);

/**
 * Load the shipped default tables from config/default.json.
 */
export function loadDefaultConfig(): FundMetricsConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(DEFAULT_CONFIG_URL, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Cannot read default configuration (${DEFAULT_CONFIG_URL.pathname}): ${errorMessage(error)}`);
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError('Default configuration is invalid', formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Validate an unknown value as a configuration fragment.
 */
export function parsePartialConfig(raw: unknown, origin: string): PartialFundMetricsConfig {
    const parsed = partialConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration in ${origin}`, formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Load a fundmetrics.config.json through cosmiconfig: the explicit path when
 * given, otherwise a search of the working directory.
 * Returns null when no file is found.
 */
async function loadConfigFile(explicitPath?: string): Promise<PartialFundMetricsConfig | null> {
    const explorer = cosmiconfig('fundmetrics', {
        searchPlaces: ['fundmetrics.config.json', '.fundmetricsrc.json', 'package.json'],
    });

    let result: CosmiconfigResult;
    try {
        result = explicitPath ? await explorer.load(explicitPath) : await explorer.search();
    } catch (error) {
        throw new ConfigurationError(`Cannot read config file ${explicitPath ?? ''}: ${errorMessage(error)}`);
    }

    if (!result || result.isEmpty) return null;

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    const content: unknown = result.config;
    return parsePartialConfig(content, result.filepath);
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): PartialFundMetricsConfig {
    const env: PartialFundMetricsConfig = {};
    const level = envLogLevel();
    if (level) env.logLevel = level;
    return env;
}

/**
 * Overlay a fragment on a full configuration.
 */
export function mergeConfig(base: FundMetricsConfig, override: PartialFundMetricsConfig | null): FundMetricsConfig {
    if (!override) return base;

    return {
        ...base,
        ...override,
        headerAliases: { ...base.headerAliases, ...override.headerAliases },
        fields: { ...base.fields, ...override.fields },
        aliasTables: { ...base.aliasTables, ...override.aliasTables },
        metrics: { ...base.metrics, ...override.metrics },
        tracks: { ...base.tracks, ...override.tracks },
    };
}

/**
 * Merge configuration from multiple sources and compile it.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: PartialFundMetricsConfig = {},
    configPath?: string
): Promise<{ config: FundMetricsConfig; compiled: CompiledConfig }> {
    const fileConfig = await loadConfigFile(configPath);
    const envConfig = loadEnvVars();

    const config = [fileConfig, envConfig, cliFlags].reduce<FundMetricsConfig>(
        (merged, layer) => mergeConfig(merged, layer),
        loadDefaultConfig()
    );

    return { config, compiled: compileConfig(config) };
}

// ─── Compilation ─────────────────────────────────────────

const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set(['currency', 'count']);

const POLICY_TYPES: Record<AggregationPolicy, ReadonlySet<FieldType>> = {
    IDENTITY: new Set(['string', 'currency', 'count']),
    SUM_SAFE: NUMERIC_TYPES,
    MAX_OF_PARSED: NUMERIC_TYPES,
    UNION: new Set(['string']),
};

/**
 * Display label for a window without one.
 */
export function windowLabel(window: PeriodWindow): string {
    return window.label ?? `${window.startYear}-${window.endYear}`;
}

function compileYearRule(
    rule: FundMetricsConfig['yearPatterns'][number],
    problems: string[]
): CompiledYearRule | null {
    if (rule.minYear > rule.maxYear) {
        problems.push(`yearPatterns.${rule.name}: minYear ${rule.minYear} is after maxYear ${rule.maxYear}`);
    }
    const flags = rule.flags ?? '';
    try {
        return {
            name: rule.name,
            regex: new RegExp(rule.pattern, flags.includes('g') ? flags : `${flags}g`),
            century: rule.century,
            minYear: rule.minYear,
            maxYear: rule.maxYear,
        };
    } catch (error) {
        problems.push(`yearPatterns.${rule.name}: pattern does not compile (${errorMessage(error)})`);
        return null;
    }
}

/**
 * Check every cross-reference between the tables. Returns one message per problem.
 */
export function collectConfigProblems(config: FundMetricsConfig): string[] {
    const problems: string[] = [];
    const fields = config.fields;
    const typeOf = (name: string): FieldType | undefined => fields[name]?.type;

    const key = fields[config.keyField];
    if (!key) {
        problems.push(`keyField "${config.keyField}" has no entry in the policy table`);
    } else if (key.type !== 'string' || key.policy !== 'IDENTITY') {
        problems.push(`keyField "${config.keyField}" must be a string IDENTITY field`);
    }

    for (const field of Object.keys(config.headerAliases)) {
        if (!fields[field]) {
            problems.push(`headerAliases declares "${field}" but the policy table has no entry for it`);
        }
    }

    for (const [name, def] of Object.entries(fields)) {
        if (!POLICY_TYPES[def.policy].has(def.type)) {
            problems.push(`fields.${name}: policy ${def.policy} cannot apply to a ${def.type} field`);
        }
        if (def.adjacentField !== undefined) {
            if (def.adjacentField === name) {
                problems.push(`fields.${name}: adjacentField cannot be the field itself`);
            } else if (!fields[def.adjacentField]) {
                problems.push(`fields.${name}: adjacentField "${def.adjacentField}" is not declared`);
            }
            if (!NUMERIC_TYPES.has(def.type)) {
                problems.push(`fields.${name}: adjacentField only applies to currency and count fields`);
            }
        }
        for (const fallback of def.textFallbackFields ?? []) {
            if (fallback === name) {
                problems.push(`fields.${name}: textFallbackFields cannot include the field itself`);
            } else if (!fields[fallback]) {
                problems.push(`fields.${name}: textFallbackFields entry "${fallback}" is not declared`);
            }
        }
        if (def.textFallbackFields !== undefined && def.type !== 'currency') {
            problems.push(`fields.${name}: textFallbackFields only applies to currency fields`);
        }
        if (def.aliasTable !== undefined) {
            if (!config.aliasTables[def.aliasTable]) {
                problems.push(`fields.${name}: aliasTable "${def.aliasTable}" is not defined`);
            }
            if (def.type !== 'string') {
                problems.push(`fields.${name}: aliasTable only applies to string fields`);
            }
        }
    }

    const expectType = (path: string, field: string, allowed: ReadonlySet<FieldType>) => {
        const type = typeOf(field);
        if (!type) {
            problems.push(`${path} references undeclared field "${field}"`);
        } else if (!allowed.has(type)) {
            problems.push(`${path} field "${field}" is ${type}, expected ${[...allowed].join(' or ')}`);
        }
    };

    const { metrics } = config;
    expectType('metrics.investmentField', metrics.investmentField, new Set(['currency']));
    expectType('metrics.followOnField', metrics.followOnField, new Set(['currency']));
    expectType('metrics.institutionField', metrics.institutionField, new Set(['string']));
    for (const [label, field] of Object.entries(metrics.trainees)) {
        expectType(`metrics.trainees.${label}`, field, new Set(['count']));
    }
    if (metrics.outcomeField !== undefined) {
        expectType('metrics.outcomeField', metrics.outcomeField, new Set(['string']));
    }

    for (const [name, track] of Object.entries(config.tracks)) {
        if (track.field === undefined) continue;
        if (!fields[track.field]) {
            problems.push(`tracks.${name} references undeclared field "${track.field}"`);
        }
        if (!track.equals?.length && !track.contains) {
            problems.push(`tracks.${name} filters on "${track.field}" but gives neither equals nor contains`);
        }
    }

    for (const field of config.breakdowns) {
        if (!fields[field]) {
            problems.push(`breakdowns references undeclared field "${field}"`);
        }
    }

    for (const window of config.windows) {
        if (window.startYear > window.endYear) {
            problems.push(`windows.${windowLabel(window)}: startYear ${window.startYear} is after endYear ${window.endYear}`);
        }
    }

    return problems;
}

/**
 * Validate the merged configuration and freeze it into the form the
 * pipeline stages read. Raises before any data is processed.
 */
export function compileConfig(config: FundMetricsConfig): CompiledConfig {
    const problems = collectConfigProblems(config);

    const yearRules: CompiledYearRule[] = [];
    for (const rule of config.yearPatterns) {
        const compiled = compileYearRule(rule, problems);
        if (compiled) yearRules.push(Object.freeze(compiled));
    }

    if (problems.length > 0) {
        throw new ConfigurationError('Configuration is inconsistent', problems);
    }

    const fields = new Map<string, CanonicalField>();
    for (const [name, def] of Object.entries(config.fields)) {
        fields.set(name, Object.freeze({ name, ...def }));
    }

    const headerAliases = new Map<string, readonly string[]>();
    for (const name of fields.keys()) {
        const aliases = new Set([normalizeLabel(name)]);
        for (const alias of config.headerAliases[name] ?? []) {
            aliases.add(normalizeLabel(alias));
        }
        headerAliases.set(name, Object.freeze([...aliases]));
    }

    const aliasTables = new Map<string, ReadonlyMap<string, string>>();
    for (const [table, entries] of Object.entries(config.aliasTables)) {
        const normalized = new Map<string, string>();
        for (const [variant, canonical] of Object.entries(entries)) {
            normalized.set(normalizeLabel(variant), canonical);
        }
        aliasTables.set(table, normalized);
    }

    return Object.freeze({
        keyField: config.keyField,
        fields,
        headerAliases,
        aliasTables,
        yearRules: Object.freeze(yearRules),
        sentinels: new Set(config.sentinels.map((s) => s.trim().toUpperCase())),
        headerStopwords: new Set(config.headerStopwords.map((w) => w.toLowerCase())),
        metrics: Object.freeze({ ...config.metrics, trainees: Object.freeze({ ...config.metrics.trainees }) }),
        outcomeCategories: Object.freeze(config.outcomeCategories.map((c) => Object.freeze({ ...c }))),
        tracks: new Map(Object.entries(config.tracks)),
        windows: Object.freeze(
            config.windows.map((w) => Object.freeze({ label: windowLabel(w), startYear: w.startYear, endYear: w.endYear }))
        ),
        breakdowns: Object.freeze([...config.breakdowns]),
        policyOf: (field: string) => fields.get(field)?.policy,
    });
}
