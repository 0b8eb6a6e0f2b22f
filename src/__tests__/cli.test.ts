import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createProgram, parseWindow } from '../cli/program.js';
import { RunLedger } from '../storage/run-ledger.js';
import { ConfigurationError } from '../utils/errors.js';

describe('parseWindow', () => {
    it('should parse plain and labelled ranges', () => {
        expect(parseWindow('2015-2024')).toEqual({ startYear: 2015, endYear: 2024 });
        expect(parseWindow('5-Year=2020-2024')).toEqual({ label: '5-Year', startYear: 2020, endYear: 2024 });
    });

    it('should reject anything else', () => {
        expect(() => parseWindow('soon')).toThrow(ConfigurationError);
    });
});

describe('run command', () => {
    it('should write a report and record the run', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fundmetrics-cli-'));
        const input = path.join(dir, 'extract.csv');
        const out = path.join(dir, 'report.json');
        const ledgerPath = path.join(dir, 'runs.db');
        const configPath = path.join(dir, 'fundmetrics.config.json');
        fs.writeFileSync(input, 'Project ID,Award Amount\n2020IL1,50000\n2020IL1,50000\n2021IL2,25000\n');
        fs.writeFileSync(configPath, '{}');

        await createProgram().parseAsync([
            'node', 'fundmetrics', 'run', input,
            '--config', configPath,
            '--format', 'json',
            '--out', out,
            '--ledger', ledgerPath,
            '--label', 'cli',
            '--log-level', 'silent',
            '--json-logs',
            '--breakdown', 'awardType',
            '--window', '2020-2024',
        ]);

        const report: unknown = JSON.parse(fs.readFileSync(out, 'utf-8'));
        expect(report).toMatchObject({
            metrics: [{ window: { label: '2020-2024' }, projectCount: 2, investment: 75000 }],
            breakdowns: [
                { field: 'awardType', track: null, rows: [{ value: '(none)', projects: 2, investment: 75000, followOnFunding: 0 }] },
            ],
            quality: { rawRecordCount: 3, entityCount: 2, duplicationFactor: 1.5 },
        });

        const ledger = new RunLedger(ledgerPath);
        expect(ledger.listRuns().map((run) => [run.label, run.entityCount])).toEqual([['cli', 2]]);
        ledger.close();

        fs.rmSync(dir, { recursive: true, force: true });
    });
});
