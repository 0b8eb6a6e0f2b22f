import { Command } from 'commander';
import { resolveConfig, type PartialFundMetricsConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { VERSION } from '../utils/version.js';
import { loadSource } from '../io/source-loader.js';
import { runPipeline } from '../pipeline/run-pipeline.js';
import { exportReport, isReportFormat, renderReport, REPORT_FORMATS } from '../exporters/export.js';
import { RunLedger } from '../storage/run-ledger.js';
import type { PeriodWindow, SourceTable } from '../types/index.js';

interface LogOptions {
    logLevel?: string;
    jsonLogs?: boolean;
}

interface RunOptions extends LogOptions {
    headerRow: string;
    config?: string;
    window?: string[];
    track?: string[];
    breakdown?: string[];
    format: string;
    out?: string;
    ledger?: string;
    label?: string;
}

interface HistoryOptions extends LogOptions {
    ledger: string;
    limit: string;
    json?: boolean;
}

interface ConfigOptions extends LogOptions {
    config?: string;
}

/**
 * Parse "2015-2024" or "5-Year=2020-2024" into a window.
 */
export function parseWindow(text: string): PeriodWindow {
    const match = /^(?:(.+)=)?\s*(\d{4})\s*-\s*(\d{4})\s*$/.exec(text);
    if (!match?.[2] || !match[3]) {
        throw new ConfigurationError(`Invalid window "${text}"`, ['expected START-END or LABEL=START-END, e.g. 2015-2024']);
    }
    const window: PeriodWindow = {
        startYear: Number.parseInt(match[2], 10),
        endYear: Number.parseInt(match[3], 10),
    };
    if (match[1]) window.label = match[1].trim();
    return window;
}

function parseInteger(text: string, name: string): number {
    const value = Number.parseInt(text, 10);
    if (Number.isNaN(value) || value < 0) {
        throw new ConfigurationError(`Invalid ${name} "${text}"`, [`${name} must be a non-negative integer`]);
    }
    return value;
}

/**
 * CLI flags that override configuration.
 */
function cliOverrides(opts: LogOptions & { window?: string[]; breakdown?: string[] }): PartialFundMetricsConfig {
    const overrides: PartialFundMetricsConfig = {};
    if (opts.logLevel !== undefined) {
        if (!isLogLevel(opts.logLevel)) {
            throw new ConfigurationError(`Invalid log level "${opts.logLevel}"`, ['expected error | warn | info | debug | silent']);
        }
        overrides.logLevel = opts.logLevel;
    }
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.window?.length) overrides.windows = opts.window.map(parseWindow);
    if (opts.breakdown?.length) overrides.breakdowns = opts.breakdown;
    return overrides;
}

function fail(error: unknown, message: string): never {
    getLogger().error({ err: error }, message);
    process.exit(1);
}

/**
 * Build the `fundmetrics` command tree.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('fundmetrics')
        .description('Deduplicated funding metrics (projects, investment, trainees, ROI) from multi-row project extracts.')
        .version(VERSION);

    // ─── RUN command ──────────────────────────────────────────

    program
        .command('run')
        .description('Normalize, resolve and aggregate one or more extracts')
        .argument('<inputs...>', 'Source files (.csv or .json)')
        .option('--header-row <n>', 'Row index (0-based) holding the effective CSV header', '0')
        .option('-c, --config <path>', 'Config file (default: search for fundmetrics.config.json)')
        .option('-w, --window <range...>', 'Windows as START-END or LABEL=START-END')
        .option('-t, --track <names...>', 'Tracks to aggregate (e.g. all 104b 104g)')
        .option('-b, --breakdown <fields...>', 'Fields to break each window down by (default: awardType institution sciencePriority)')
        .option('-f, --format <format>', `Report format: ${REPORT_FORMATS.join(' | ')}`, 'markdown')
        .option('-o, --out <path>', 'Write the report to a file instead of stdout')
        .option('--ledger <dbPath>', 'Record the run in a SQLite ledger')
        .option('--label <label>', 'Label stored with the ledger entry')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false)
        .action(async (inputs: string[], opts: RunOptions) => {
            try {
                const format = opts.format.toLowerCase();
                if (!isReportFormat(format)) {
                    throw new ConfigurationError(`Invalid format "${opts.format}"`, [`valid: ${REPORT_FORMATS.join(', ')}`]);
                }
                const headerRow = parseInteger(opts.headerRow, 'header row');

                const { config, compiled } = await resolveConfig(cliOverrides(opts), opts.config);
                initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
                const logger = getLogger();
                logger.info({ inputs, windows: compiled.windows.length, tracks: opts.track ?? [] }, 'Starting run');

                const sources: SourceTable[] = [];
                for (const input of inputs) {
                    sources.push(await loadSource(input, { headerRow }));
                }

                const result = runPipeline(sources, compiled, { tracks: opts.track });

                if (opts.out) {
                    exportReport(result, opts.out, format);
                } else {
                    process.stdout.write(renderReport(result, format));
                }

                if (opts.ledger) {
                    const ledger = new RunLedger(opts.ledger);
                    try {
                        const runId = ledger.recordRun({
                            version: VERSION,
                            label: opts.label,
                            sources: sources.map((source) => source.source),
                            config,
                            metrics: result.metrics,
                            quality: result.quality,
                        });
                        logger.info({ runId, ledger: opts.ledger }, 'Run stored in ledger');
                    } finally {
                        ledger.close();
                    }
                }
            } catch (error) {
                fail(error, 'Run failed');
            }
        });

    // ─── HISTORY command ──────────────────────────────────────

    program
        .command('history')
        .description('List runs recorded in a ledger')
        .requiredOption('--ledger <dbPath>', 'Ledger database path')
        .option('-n, --limit <n>', 'Number of runs to show', '20')
        .option('--json', 'Print runs as JSON', false)
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false)
        .action((opts: HistoryOptions) => {
            try {
                const overrides = cliOverrides(opts);
                initLogger({ level: overrides.logLevel ?? 'warn', jsonLogs: overrides.jsonLogs ?? false });

                const ledger = new RunLedger(opts.ledger);
                const runs = ledger.listRuns(parseInteger(opts.limit, 'limit'));
                ledger.close();

                if (opts.json) {
                    process.stdout.write(JSON.stringify(runs, null, 2) + '\n');
                    return;
                }

                if (runs.length === 0) {
                    process.stdout.write('No runs recorded.\n');
                    return;
                }
                for (const run of runs) {
                    const label = run.label ? ` ${run.label}` : '';
                    process.stdout.write(
                        `#${run.runId} ${run.createdAt}${label}  records=${run.rawRecordCount} entities=${run.entityCount} ` +
                        `duplication=${run.duplicationFactor.toFixed(2)}  ${run.sources.join(', ')}\n`
                    );
                }
            } catch (error) {
                fail(error, 'History failed');
            }
        });

    // ─── CONFIG command ───────────────────────────────────────

    program
        .command('config')
        .description('Print the resolved configuration after validation')
        .option('-c, --config <path>', 'Config file (default: search for fundmetrics.config.json)')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false)
        .action(async (opts: ConfigOptions) => {
            try {
                const { config } = await resolveConfig(cliOverrides(opts), opts.config);
                process.stdout.write(JSON.stringify(config, null, 2) + '\n');
            } catch (error) {
                fail(error, 'Configuration is invalid');
            }
        });

    return program;
}
