/**
 * Root of every failure the CLI core raises.
 */
export class TTSAppError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TTSAppError';
    }
}

/**
 * Generic failure reported by the voice API (non-2xx status).
 */
export class ApiError extends TTSAppError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly responseBody?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ApiError';
    }

    static fromResponse(statusCode: number, responseBody: string): ApiError {
        return new ApiError(`API error (${statusCode}): ${responseBody}`, statusCode, responseBody);
    }
}

/**
 * Missing or rejected API key. Only a rejection by the API carries a status (401).
 */
export class AuthenticationError extends ApiError {
    constructor(message: string = 'Invalid API key', statusCode?: number) {
        super(message, statusCode);
        this.name = 'AuthenticationError';
    }
}

/**
 * Rate limit exceeded (429).
 */
export class RateLimitError extends ApiError {
    constructor(message: string = 'API rate limit exceeded. Please try again later.') {
        super(message, 429);
        this.name = 'RateLimitError';
    }
}

/**
 * Connection-level failure: DNS, timeout, reset, aborted stream.
 */
export class NetworkError extends ApiError {
    constructor(message: string, cause?: unknown) {
        super(message, undefined, undefined, { cause });
        this.name = 'NetworkError';
    }
}

/**
 * Synthesis requested for a voice the API does not know (404).
 */
export class VoiceNotFoundError extends ApiError {
    constructor(public readonly voiceId: string) {
        super(`Voice with ID '${voiceId}' not found`, 404);
        this.name = 'VoiceNotFoundError';
    }
}

export class ValidationError extends TTSAppError {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * Local I/O problem: missing directory, wrong entry type, failed write.
 */
export class FileSystemError extends TTSAppError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'FileSystemError';
    }
}

/**
 * Whether a failure is worth offering the user another attempt.
 */
export function isRetriable(error: unknown): boolean {
    if (error instanceof AuthenticationError || error instanceof VoiceNotFoundError) {
        return false;
    }
    // RateLimitError and NetworkError are ApiError subclasses
    return error instanceof ApiError;
}
