import { FailureKind, FailureReason } from '../entities/Room';

/**
 * Base class for every error the pipeline raises on purpose.
 * `kind` is what ends up in a room's failure reason.
 */
export abstract class PipelineError extends Error {
    abstract readonly kind: FailureKind | 'ConfigError';

    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
    }
}

/**
 * Missing or malformed configuration. Fatal at startup.
 */
export class ConfigError extends PipelineError {
    readonly kind = 'ConfigError' as const;

    constructor(message: string, public readonly missingKeys: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Footage search returned nothing, or the search/download/write failed.
 */
export class DownloadError extends PipelineError {
    readonly kind = 'DownloadError' as const;

    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'DownloadError';
    }
}

/**
 * The text model could not be reached or produced nothing usable.
 */
export class GenerationError extends PipelineError {
    readonly kind = 'GenerationError' as const;

    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'GenerationError';
    }
}

/**
 * The video service rejected the job (credentials, payload, upload).
 */
export class SubmissionError extends PipelineError {
    readonly kind = 'SubmissionError' as const;

    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'SubmissionError';
    }
}

/**
 * Polling passed its deadline without reaching a terminal state.
 */
export class VideoTimeoutError extends PipelineError {
    readonly kind = 'TimeoutError' as const;

    constructor(
        message: string,
        public readonly videoId: string,
        public readonly elapsedMs: number
    ) {
        super(message);
        this.name = 'TimeoutError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Maps anything thrown inside a room's run to the reason recorded on its result.
 */
export function toFailureReason(error: unknown): FailureReason {
    if (error instanceof PipelineError && error.kind !== 'ConfigError') {
        return { kind: error.kind, message: error.message };
    }
    return { kind: 'UnexpectedError', message: errorMessage(error) };
}
