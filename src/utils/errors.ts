/**
 * Error taxonomy for the retrieval pipeline.
 *
 * Batch-level failures (validation, retrieval, output) abort the run.
 * ParseError is recovered per record and only ever logged.
 */

export type PipelineErrorCode = 'VALIDATION' | 'RETRIEVAL' | 'PARSE' | 'OUTPUT';

export abstract class PipelineError extends Error {
    abstract readonly code: PipelineErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Bad user input: blank query, non-positive limit, invalid config file.
 */
export class ValidationError extends PipelineError {
    readonly code = 'VALIDATION';
}

/**
 * The literature service was unreachable, timed out, or answered with
 * something that is not a search or fetch response.
 */
export class RetrievalError extends PipelineError {
    readonly code = 'RETRIEVAL';
}

/**
 * One record's payload is structurally unrecognizable.
 */
export class ParseError extends PipelineError {
    readonly code = 'PARSE';

    constructor(
        public readonly identifier: string,
        reason: string
    ) {
        super(`Record ${identifier}: ${reason}`);
    }
}

/**
 * The output destination could not be written.
 */
export class OutputError extends PipelineError {
    readonly code = 'OUTPUT';

    constructor(
        public readonly path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * Render an unknown thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
