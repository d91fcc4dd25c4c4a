import { Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import { AppError, getErrorMessage } from "../utils/errors";

export interface ErrorResponse {
    status: number;
    body: {
        error: string;
        message?: string;
        details?: z.ZodIssue[];
    };
}

/**
 * Map an error raised while serving `operation` to a status and JSON body.
 */
export function toErrorResponse(error: unknown, operation: string): ErrorResponse {
    if (error instanceof z.ZodError) {
        return {
            status: 400,
            body: { error: 'Validation failed', details: error.errors }
        };
    }

    if (error instanceof AppError) {
        return {
            status: error.statusCode,
            body: { error: error.code, message: error.message }
        };
    }

    return {
        status: 500,
        body: { error: `${operation} failed`, message: getErrorMessage(error) }
    };
}

export function sendError(res: Response, error: unknown, operation: string): Response {
    const { status, body } = toErrorResponse(error, operation);

    if (status >= 500) {
        logger.error({ operation, status, error: getErrorMessage(error) }, 'Request failed');
    } else {
        logger.warn({ operation, status, error: body.message ?? body.error }, 'Request rejected');
    }

    return res.status(status).json(body);
}
