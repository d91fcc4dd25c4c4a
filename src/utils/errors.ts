/**
 * Application Errors
 *
 * Every error the service raises on purpose carries a stable `code` so that
 * routes can map it to an HTTP status without string matching.
 */

export type AppErrorCode =
    | 'INVALID_REQUEST'
    | 'NOT_FOUND'
    | 'PROVIDER_UNAVAILABLE';

export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: AppErrorCode,
        public readonly statusCode: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AppError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Structurally invalid request (empty query vector, bad limit or threshold).
 * The caller must fix the input; retrying unchanged will fail again.
 */
export class InvalidRequestError extends AppError {
    constructor(message: string) {
        super(message, 'INVALID_REQUEST', 400);
        this.name = 'InvalidRequestError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 'NOT_FOUND', 404);
        this.name = 'NotFoundError';
    }
}

/**
 * The embedding or completion provider cannot serve requests at all
 * (missing deployment, bad credentials). Callers switch to a degraded path.
 */
export class ProviderUnavailableError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 'PROVIDER_UNAVAILABLE', 503, { cause });
        this.name = 'ProviderUnavailableError';
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}
