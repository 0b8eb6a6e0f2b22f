/**
 * Raised at configuration-load time, before any data is processed, when
 * the tables are malformed or reference each other inconsistently.
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly problems: readonly string[] = []
    ) {
        super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised by the source loaders when a file cannot be read at all.
 * Malformed cells inside a readable file are never errors.
 */
export class SourceLoadError extends Error {
    constructor(
        message: string,
        public readonly path: string,
        cause?: unknown
    ) {
        super(`${message}: ${path}`, { cause });
        this.name = 'SourceLoadError';
    }
}

/**
 * Human-readable message for an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
