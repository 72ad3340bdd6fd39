export type SubmissionErrorKind = 'network' | 'authentication' | 'validation' | 'rate_limited' | 'server';

/**
 * Base class for every error the poster raises on purpose.
 */
export class PosterError extends Error {
    constructor(message: string, public code: string) {
        super(message);
        this.name = 'PosterError';
    }
}

/**
 * Missing or invalid environment configuration. Fatal before any submission.
 */
export class ConfigurationError extends PosterError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIGURATION');
        this.name = 'ConfigurationError';
    }
}

/**
 * Topic file that cannot be read, is not JSON, or is not a list of topics.
 */
export class MalformedInputError extends PosterError {
    constructor(message: string, public path: string) {
        super(message, 'MALFORMED_INPUT');
        this.name = 'MalformedInputError';
    }
}

export class SubmissionError extends PosterError {
    constructor(
        message: string,
        public kind: SubmissionErrorKind,
        public statusCode?: number
    ) {
        super(message, 'SUBMISSION');
        this.name = 'SubmissionError';
    }

    /**
     * Map an HTTP status to the failure kind it represents.
     */
    static kindForStatus(status: number): SubmissionErrorKind {
        if (status === 429) return 'rate_limited';
        if (status === 401 || status === 403) return 'authentication';
        if (status >= 500) return 'server';
        return 'validation';
    }
}

export class LoggingError extends PosterError {
    constructor(message: string, public underlying?: unknown) {
        super(message, 'LOGGING');
        this.name = 'LoggingError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
