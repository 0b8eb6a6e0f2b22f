import { writeFileSync } from 'node:fs';
import type { AggregateMetrics, Breakdown, DataQualityReport } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../utils/version.js';

// ─── Types ───────────────────────────────────────────────

export type ReportFormat = 'json' | 'csv' | 'markdown';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'csv', 'markdown'];

export function isReportFormat(value: string): value is ReportFormat {
    return REPORT_FORMATS.some((format) => format === value);
}

/**
 * What the exporters read from a pipeline result.
 */
export interface ReportData {
    metrics: readonly AggregateMetrics[];
    breakdowns?: readonly Breakdown[];
    quality: DataQualityReport;
}

// ─── Main Export Functions ───────────────────────────────

/**
 * Render a report in the given format.
 */
export function renderReport(data: ReportData, format: ReportFormat): string {
    switch (format) {
        case 'json':
            return renderJson(data);
        case 'csv':
            return renderCsv(data);
        case 'markdown':
            return renderMarkdown(data);
        default:
            throw new Error(`Unsupported report format: ${String(format)}`);
    }
}

/**
 * Render a report and write it to a file.
 */
export function exportReport(data: ReportData, outputPath: string, format: ReportFormat): void {
    const content = renderReport(data, format);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info({ format, outputPath, metrics: data.metrics.length }, 'Report exported');
}

// ─── Format Implementations ─────────────────────────────

function renderJson(data: ReportData): string {
    return JSON.stringify({
        fundmetrics: { version: VERSION },
        metrics: data.metrics,
        breakdowns: data.breakdowns ?? [],
        quality: data.quality,
    }, null, 2) + '\n';
}

function csvField(value: string | number | null): string {
    if (value === null) return '';
    const text = String(value);
    return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function traineeCategories(metrics: readonly AggregateMetrics[]): string[] {
    const labels: string[] = [];
    for (const metric of metrics) {
        for (const label of Object.keys(metric.trainees.byCategory)) {
            if (!labels.includes(label)) labels.push(label);
        }
    }
    return labels;
}

/**
 * One row per window (and track) metric.
 */
function renderCsv(data: ReportData): string {
    const categories = traineeCategories(data.metrics);
    const header = [
        'window',
        'start_year',
        'end_year',
        'track',
        'projects',
        'investment',
        'follow_on_funding',
        'roi',
        ...categories.map((label) => `trainees_${label}`),
        'trainees_total',
        'distinct_institutions',
        'trainees_per_project',
        'investment_per_project',
        'investment_per_trainee',
        'excluded_unextractable',
    ];

    let csv = header.join(',') + '\n';
    for (const m of data.metrics) {
        csv += [
            m.window.label,
            m.window.startYear,
            m.window.endYear,
            m.track,
            m.projectCount,
            m.investment,
            m.followOnFunding,
            m.roi,
            ...categories.map((label) => m.trainees.byCategory[label] ?? 0),
            m.trainees.total,
            m.distinctInstitutions,
            m.efficiency.traineesPerProject,
            m.efficiency.investmentPerProject,
            m.efficiency.investmentPerTrainee,
            m.excludedUnextractable,
        ].map(csvField).join(',') + '\n';
    }
    return csv;
}

function money(amount: number): string {
    return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function ratio(value: number, digits = 2): string {
    return value.toFixed(digits);
}

function cell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

function renderMetricSection(m: AggregateMetrics): string {
    const title = m.track === null ? m.window.label : `${m.window.label} [${m.track}]`;
    const rows: Array<[string, string]> = [
        ['Years', `${m.window.startYear}-${m.window.endYear}`],
        ['Projects', String(m.projectCount)],
        ['Investment', money(m.investment)],
        ['Follow-on funding', money(m.followOnFunding)],
        ['ROI', ratio(m.roi, 4)],
        ...Object.entries(m.trainees.byCategory).map(([label, count]): [string, string] => [`Trainees (${label})`, String(count)]),
        ['Trainees (total)', String(m.trainees.total)],
        ['Institutions', String(m.distinctInstitutions)],
        ['Trainees per project', ratio(m.efficiency.traineesPerProject)],
        ['Investment per project', money(m.efficiency.investmentPerProject)],
        ['Investment per trainee', money(m.efficiency.investmentPerTrainee)],
        ...Object.entries(m.outcomes).map(([label, count]): [string, string] => [`Outcomes (${label})`, String(count)]),
        ['Excluded (no year)', String(m.excludedUnextractable)],
    ];

    let md = `## ${cell(title)}\n\n| Metric | Value |\n| --- | --- |\n`;
    for (const [name, value] of rows) {
        md += `| ${name} | ${value} |\n`;
    }
    if (m.emptyDenominators.length > 0) {
        md += `\nZero denominators: ${m.emptyDenominators.join(', ')}\n`;
    }
    return md;
}

function renderBreakdownSection(b: Breakdown): string {
    const scope = b.track === null ? b.window.label : `${b.window.label} [${b.track}]`;
    let md = `## ${cell(b.field)} breakdown: ${cell(scope)}\n\n`;
    md += '| Value | Projects | Investment | Follow-on funding |\n| --- | --- | --- | --- |\n';
    for (const row of b.rows) {
        md += `| ${cell(row.value)} | ${row.projects} | ${money(row.investment)} | ${money(row.followOnFunding)} |\n`;
    }
    return md;
}

function renderQualitySection(q: DataQualityReport): string {
    let md = '## Data Quality\n\n| Check | Value |\n| --- | --- |\n';
    md += `| Raw records | ${q.rawRecordCount} |\n`;
    md += `| Entities | ${q.entityCount} |\n`;
    md += `| Duplication factor | ${ratio(q.duplicationFactor)} |\n`;
    md += `| Records without identifier | ${q.recordsWithoutIdentifier} |\n`;
    for (const [kind, count] of Object.entries(q.issueCounts)) {
        md += `| ${kind} | ${count} |\n`;
    }

    if (q.windows.length > 0) {
        md += '\n| Window | Raw records | Entities | Duplication factor |\n| --- | --- | --- | --- |\n';
        for (const w of q.windows) {
            md += `| ${cell(w.window.label)} | ${w.rawRecordCount} | ${w.entityCount} | ${ratio(w.duplicationFactor)} |\n`;
        }
    }

    const completeness = Object.entries(q.completeness);
    if (completeness.length > 0) {
        md += '\n| Field | Populated | Completeness |\n| --- | --- | --- |\n';
        for (const [field, c] of completeness) {
            md += `| ${field} | ${c.populated}/${c.total} | ${(c.ratio * 100).toFixed(1)}% |\n`;
        }
    }

    if (q.inconsistentEntities.length > 0) {
        md += '\n### Inconsistent entities\n\n';
        for (const entity of q.inconsistentEntities) {
            const fields = entity.conflicts.map((c) => `${c.field} (${c.values.map(cell).join(' / ')})`).join('; ');
            md += `- ${cell(entity.key)} (${entity.recordCount} records): ${fields}\n`;
        }
    }

    if (q.unextractableIdentifiers.length > 0) {
        md += `\n### Identifiers without a year\n\n${q.unextractableIdentifiers.map((key) => `- ${cell(key)}`).join('\n')}\n`;
    }

    return md;
}

function renderMarkdown(data: ReportData): string {
    const sections = [
        '# Funding Metrics Report\n',
        ...data.metrics.map(renderMetricSection),
        ...(data.breakdowns ?? []).map(renderBreakdownSection),
        renderQualitySection(data.quality),
    ];
    return sections.join('\n');
}
