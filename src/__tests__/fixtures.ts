import type { CellValue, CompiledConfig, RawRecord } from '../types/index.js';
import { compileConfig, loadDefaultConfig } from '../utils/config.js';

export function defaultCompiledConfig(): CompiledConfig {
    return compileConfig(loadDefaultConfig());
}

/**
 * A frozen raw record with the given canonical values.
 */
export function record(values: Record<string, CellValue>, row = 1, source = 'test.csv'): RawRecord {
    return Object.freeze({
        values: Object.freeze({ ...values }),
        provenance: Object.freeze({ source, row }),
    });
}
