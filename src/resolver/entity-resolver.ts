import type {
    AmountProvenance,
    CanonicalField,
    CellValue,
    CompiledConfig,
    FieldValue,
    IdentityConflict,
    InconsistentIdentityFieldIssue,
    MissingIdentifierIssue,
    ParsedAmount,
    ProjectEntity,
    RawRecord,
    UnextractableIdentifierIssue,
    UnparsedValueIssue,
} from '../types/index.js';
import { present } from '../types/index.js';
import { extractYear } from '../extract/year-extractor.js';
import { parseAmount, parseCount } from '../extract/value-parser.js';
import { stageLogger } from '../utils/logger.js';
import { cellText, collapseWhitespace } from '../utils/text.js';
import { applyAliasTable, distinctLabels } from './alias-table.js';

export interface ResolutionResult {
    /** One entity per distinct key, sorted by key */
    entities: ProjectEntity[];

    /** Raw records that carried an identifier */
    keyedRecordCount: number;

    missingIdentifiers: MissingIdentifierIssue[];
    unextractableIdentifiers: UnextractableIdentifierIssue[];
    inconsistencies: InconsistentIdentityFieldIssue[];
    unparsedValues: UnparsedValueIssue[];
}

type ResolverConfig = Pick<CompiledConfig, 'keyField' | 'fields' | 'aliasTables' | 'yearRules' | 'sentinels'>;

interface ResolvedField {
    value: FieldValue;
    provenance?: AmountProvenance;
    variants?: string[];
    conflict?: IdentityConflict;
    issues: UnparsedValueIssue[];
}

// ─── Ordering ────────────────────────────────────────────

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function serializeValues(record: RawRecord): string {
    const keys = Object.keys(record.values).sort();
    return JSON.stringify(keys.map((key) => [key, record.values[key] ?? null]));
}

/**
 * Stable record order inside a group: source, then row, then content.
 * Makes resolution independent of input order.
 */
export function compareRecords(a: RawRecord, b: RawRecord): number {
    return (
        compareText(a.provenance.source, b.provenance.source) ||
        a.provenance.row - b.provenance.row ||
        compareText(serializeValues(a), serializeValues(b))
    );
}

// ─── Field policies ──────────────────────────────────────

const EMPTY_RECORD: RawRecord = Object.freeze({
    values: Object.freeze({}),
    provenance: Object.freeze({ source: '', row: 0 }),
});

const PARSED_PROVENANCES: ReadonlySet<AmountProvenance> = new Set(['direct', 'summed-from-text', 'recovered-from-swap']);

/** Rank used to pick a provenance among equal amounts */
const PROVENANCE_RANK: Record<AmountProvenance, number> = {
    'direct': 3,
    'summed-from-text': 3,
    'recovered-from-swap': 3,
    'defaulted-to-zero': 2,
    'sentinel': 1,
    'absent': 0,
};

function parseFor(field: CanonicalField, record: RawRecord, config: ResolverConfig): ParsedAmount {
    const raw = record.values[field.name];
    if (field.type === 'count') {
        return parseCount(raw, { sentinels: config.sentinels });
    }
    const adjacent = field.adjacentField === undefined ? undefined : record.values[field.adjacentField];
    const fallbackTexts = (field.textFallbackFields ?? []).map((name) => record.values[name]);
    return parseAmount(raw, { sentinels: config.sentinels, adjacent, fallbackTexts });
}

function unparsed(key: string, field: CanonicalField, record: RawRecord, parsed: ParsedAmount): UnparsedValueIssue[] {
    if (parsed.provenance !== 'defaulted-to-zero') return [];
    const raw: CellValue = record.values[field.name] ?? null;
    return [{ kind: 'UnparsedValue', key, field: field.name, raw, provenance: { ...record.provenance } }];
}

function numericResult(field: CanonicalField, parsed: ParsedAmount, issues: UnparsedValueIssue[]): ResolvedField {
    const result: ResolvedField = { value: parsed.amount, issues };
    if (field.type === 'currency') result.provenance = parsed.provenance;
    return result;
}

function resolveIdentity(key: string, field: CanonicalField, group: readonly RawRecord[], config: ResolverConfig): ResolvedField {
    const carriers = group.filter((record) => present(record.values[field.name]) !== null);
    const first = carriers[0];

    let result: ResolvedField;
    if (!first) {
        result = field.type === 'string'
            ? { value: null, issues: [] }
            : numericResult(field, parseFor(field, group[0] ?? EMPTY_RECORD, config), []);
    } else if (field.type === 'string') {
        result = { value: collapseWhitespace(String(first.values[field.name])), issues: [] };
    } else {
        const parsed = parseFor(field, first, config);
        result = numericResult(field, parsed, unparsed(key, field, first, parsed));
    }

    const distinct = distinctLabels(
        carriers.map((record) => cellText(present(record.values[field.name]) ?? ''))
    );
    if (distinct.length > 1) {
        result.conflict = { field: field.name, policy: field.policy, values: distinct };
    }
    return result;
}

function resolveSumSafe(key: string, field: CanonicalField, group: readonly RawRecord[], config: ResolverConfig): ResolvedField {
    const carriers = group.filter((record) => present(record.values[field.name]) !== null);

    // First record that yields an amount; sentinels and prose only when none does
    let representative: RawRecord | undefined;
    let parsed: ParsedAmount | undefined;
    for (const record of group) {
        const candidate = parseFor(field, record, config);
        if (PARSED_PROVENANCES.has(candidate.provenance)) {
            representative = record;
            parsed = candidate;
            break;
        }
    }
    if (!representative || !parsed) {
        const adjacentCarrier = field.adjacentField === undefined
            ? undefined
            : group.find((record) => field.adjacentField !== undefined && present(record.values[field.adjacentField]) !== null);
        representative = carriers[0] ?? adjacentCarrier ?? group[0] ?? EMPTY_RECORD;
        parsed = parseFor(field, representative, config);
    }

    const result = numericResult(field, parsed, unparsed(key, field, representative, parsed));

    // One representative only; differing amounts are reported, never added up
    const byAmount = new Map<number, string>();
    for (const record of carriers) {
        const candidate = parseFor(field, record, config);
        if (!PARSED_PROVENANCES.has(candidate.provenance)) continue;
        if (!byAmount.has(candidate.amount)) {
            byAmount.set(candidate.amount, cellText(present(record.values[field.name]) ?? ''));
        }
    }
    if (byAmount.size > 1) {
        result.conflict = { field: field.name, policy: field.policy, values: [...byAmount.values()] };
    }
    return result;
}

function resolveMaxOfParsed(key: string, field: CanonicalField, group: readonly RawRecord[], config: ResolverConfig): ResolvedField {
    let best: ParsedAmount = { amount: 0, provenance: 'absent' };
    const issues: UnparsedValueIssue[] = [];

    for (const record of group) {
        const parsed = parseFor(field, record, config);
        issues.push(...unparsed(key, field, record, parsed));

        if (
            parsed.amount > best.amount ||
            (parsed.amount === best.amount && PROVENANCE_RANK[parsed.provenance] > PROVENANCE_RANK[best.provenance])
        ) {
            best = parsed;
        }
    }

    return numericResult(field, best, issues);
}

function resolveUnion(field: CanonicalField, group: readonly RawRecord[], config: ResolverConfig): ResolvedField {
    const table = field.aliasTable === undefined ? undefined : config.aliasTables.get(field.aliasTable);
    const values: string[] = [];
    for (const record of group) {
        const cell = present(record.values[field.name]);
        if (cell !== null) values.push(applyAliasTable(String(cell), table));
    }

    const variants = distinctLabels(values);
    return { value: variants[0] ?? null, variants, issues: [] };
}

function resolveField(key: string, field: CanonicalField, group: readonly RawRecord[], config: ResolverConfig): ResolvedField {
    switch (field.policy) {
        case 'IDENTITY':
            return resolveIdentity(key, field, group, config);
        case 'SUM_SAFE':
            return resolveSumSafe(key, field, group, config);
        case 'MAX_OF_PARSED':
            return resolveMaxOfParsed(key, field, group, config);
        case 'UNION':
            return resolveUnion(field, group, config);
    }
}

// ─── Entity assembly ─────────────────────────────────────

function buildEntity(key: string, group: readonly RawRecord[], config: ResolverConfig): ProjectEntity {
    const fields: Record<string, FieldValue> = {};
    const variants: Record<string, readonly string[]> = {};
    const amountProvenance: Record<string, AmountProvenance> = {};
    const conflicts: IdentityConflict[] = [];
    const parseIssues: UnparsedValueIssue[] = [];

    for (const field of config.fields.values()) {
        const resolved = resolveField(key, field, group, config);
        fields[field.name] = resolved.value;
        if (resolved.variants) variants[field.name] = Object.freeze(resolved.variants);
        if (resolved.provenance) amountProvenance[field.name] = resolved.provenance;
        if (resolved.conflict) conflicts.push(resolved.conflict);
        parseIssues.push(...resolved.issues);
    }

    // The key field resolves to the trimmed key itself
    fields[config.keyField] = key;

    return Object.freeze({
        key,
        year: extractYear(key, config.yearRules),
        fields: Object.freeze(fields),
        variants: Object.freeze(variants),
        amountProvenance: Object.freeze(amountProvenance),
        recordCount: group.length,
        consistency: !conflicts.some((conflict) => conflict.policy === 'IDENTITY'),
        conflicts: Object.freeze(conflicts),
        parseIssues: Object.freeze(parseIssues),
    });
}

/**
 * Group raw records by entity key and materialize one canonical entity per key.
 *
 * Records without a key are reported, never grouped. The output is sorted by
 * key and does not depend on the order records arrive in.
 */
export function resolveEntities(records: readonly RawRecord[], config: ResolverConfig): ResolutionResult {
    const log = stageLogger('resolver');
    const groups = new Map<string, RawRecord[]>();
    const missingIdentifiers: MissingIdentifierIssue[] = [];

    for (const record of records) {
        const rawKey = present(record.values[config.keyField]);
        if (rawKey === null) {
            missingIdentifiers.push({ kind: 'MissingIdentifier', provenance: { ...record.provenance } });
            continue;
        }
        const key = String(rawKey).trim();
        const group = groups.get(key);
        if (group) {
            group.push(record);
        } else {
            groups.set(key, [record]);
        }
    }

    const entities: ProjectEntity[] = [];
    const unextractableIdentifiers: UnextractableIdentifierIssue[] = [];
    const inconsistencies: InconsistentIdentityFieldIssue[] = [];
    const unparsedValues: UnparsedValueIssue[] = [];
    let keyedRecordCount = 0;

    for (const key of [...groups.keys()].sort(compareText)) {
        const group = [...(groups.get(key) ?? [])].sort(compareRecords);
        keyedRecordCount += group.length;

        const entity = buildEntity(key, group, config);
        entities.push(entity);

        if (entity.year === null) {
            unextractableIdentifiers.push({ kind: 'UnextractableIdentifier', key });
            log.warn({ key }, 'No year could be extracted from identifier');
        }
        for (const conflict of entity.conflicts) {
            if (conflict.policy !== 'IDENTITY') {
                log.debug({ key, field: conflict.field, values: conflict.values }, 'Representative values disagree');
                continue;
            }
            inconsistencies.push({ kind: 'InconsistentIdentityField', key, ...conflict });
            log.warn({ key, field: conflict.field, values: conflict.values }, 'Identity field disagrees across records');
        }
        unparsedValues.push(...entity.parseIssues);
    }

    for (const issue of missingIdentifiers) {
        log.warn({ source: issue.provenance.source, row: issue.provenance.row }, 'Record has no identifier');
    }

    log.info(
        {
            records: records.length,
            entities: entities.length,
            missingIdentifiers: missingIdentifiers.length,
            inconsistent: inconsistencies.length,
            unparsed: unparsedValues.length,
        },
        'Entities resolved'
    );

    return { entities, keyedRecordCount, missingIdentifiers, unextractableIdentifiers, inconsistencies, unparsedValues };
}
