/**
 * Error taxonomy.
 *
 * - ConfigurationError: fatal, raised before any provider call
 * - ProviderError: a provider call failed; `retryable` drives the retry policy
 * - ProcessingFailure: one author could not be completed; the batch goes on
 * - DegenerateInputWarning: an author has no usable text; not an error
 */

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ProviderError extends Error {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly retryable: boolean,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ProviderError';
    }
}

export class ProcessingFailure extends Error {
    constructor(
        public readonly authorName: string,
        public readonly index: number,
        public readonly attempts: number,
        cause: unknown
    ) {
        super(`Failed to process author "${authorName}" (#${index}): ${describeError(cause)}`, { cause });
        this.name = 'ProcessingFailure';
    }
}

export class DegenerateInputWarning extends Error {
    constructor(
        public readonly authorName: string,
        public readonly index: number
    ) {
        super(`Author "${authorName}" (#${index}) has no usable publication text`);
        this.name = 'DegenerateInputWarning';
    }
}

/**
 * Render an unknown thrown value as a single line.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
