/**
 * Centralized Error Handling
 * Classifies thrown values into the four failure tiers of the analysis API:
 * configuration, caller, upstream and unexpected internal errors.
 */

import logger from './logger';
import type { ErrorEnvelope } from '../types/index';

export enum ErrorCode {
    // Caller errors
    INVALID_INPUT = 'INVALID_INPUT',
    MISSING_PARAMETER = 'MISSING_PARAMETER',
    PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
    RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

    // Deployment errors
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

    // Upstream errors
    LLM_API_ERROR = 'LLM_API_ERROR',
    MALFORMED_OUTPUT = 'MALFORMED_OUTPUT',

    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface AppError {
    code: ErrorCode;
    message: string;
    statusCode: number;
    details?: Record<string, unknown>;
    isRetryable: boolean;
    userMessage: string;
}

/**
 * Raised by an `AnalysisProvider` when the remote service reports a failure.
 * The message is the provider's own and is shown to the caller.
 */
export class ProviderError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'ProviderError';
        this.status = status;
    }
}

export function isAppError(error: unknown): error is AppError {
    return (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        'statusCode' in error &&
        'userMessage' in error &&
        typeof error.code === 'string' &&
        Object.values<string>(ErrorCode).includes(error.code)
    );
}

const STATUS_CODES: Record<ErrorCode, number> = {
    [ErrorCode.INVALID_INPUT]: 400,
    [ErrorCode.MISSING_PARAMETER]: 400,
    [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
    [ErrorCode.RESOURCE_NOT_FOUND]: 404,
    [ErrorCode.CONFIGURATION_ERROR]: 500,
    [ErrorCode.LLM_API_ERROR]: 500,
    [ErrorCode.MALFORMED_OUTPUT]: 500,
    [ErrorCode.INTERNAL_ERROR]: 500,
};

const USER_MESSAGES: Record<ErrorCode, string> = {
    [ErrorCode.INVALID_INPUT]: 'Request body must be valid JSON.',
    [ErrorCode.MISSING_PARAMETER]: 'No user input provided for analysis.',
    [ErrorCode.PAYLOAD_TOO_LARGE]: 'Request body is too large. Please shorten the input and try again.',
    [ErrorCode.RESOURCE_NOT_FOUND]: 'The requested resource was not found.',
    [ErrorCode.CONFIGURATION_ERROR]:
        'Server configuration error: Gemini API key is missing. Please set the GEMINI_API_KEY environment variable.',
    [ErrorCode.LLM_API_ERROR]: 'AI generation failed due to an API error.',
    [ErrorCode.MALFORMED_OUTPUT]: 'The AI returned a malformed analysis. Please try again.',
    [ErrorCode.INTERNAL_ERROR]: 'An unexpected server error occurred during processing.',
};

const RETRYABLE = new Set<ErrorCode>([ErrorCode.LLM_API_ERROR, ErrorCode.MALFORMED_OUTPUT]);

// body-parser tags its errors with a `type` such as 'entity.parse.failed' or 'entity.too.large'
function bodyParserErrorType(error: unknown): string | undefined {
    if (error instanceof Error && 'type' in error && typeof error.type === 'string' && error.type.startsWith('entity.')) {
        return error.type;
    }
    return undefined;
}

class ErrorHandler {
    /**
     * Create standardized error object
     */
    createError(
        code: ErrorCode,
        message: string,
        details?: Record<string, unknown>,
        userMessage: string = USER_MESSAGES[code]
    ): AppError {
        return {
            code,
            message,
            statusCode: STATUS_CODES[code],
            details,
            isRetryable: RETRYABLE.has(code),
            userMessage
        };
    }

    providerFailure(providerMessage: string, details?: Record<string, unknown>): AppError {
        const text = `AI generation failed due to API error: ${providerMessage}`;
        return this.createError(ErrorCode.LLM_API_ERROR, text, details, text);
    }

    /**
     * Handle and classify errors
     */
    handleError(error: unknown, requestId?: string): AppError {
        if (isAppError(error)) {
            if (error.statusCode >= 500) {
                logger.error(error.message, undefined, { code: error.code, details: error.details }, requestId);
            } else {
                logger.warn(error.message, { code: error.code }, requestId);
            }
            return error;
        }

        if (error instanceof ProviderError) {
            logger.error('Gemini API error', error, { status: error.status }, requestId);
            return this.providerFailure(error.message, { status: error.status });
        }

        const bodyErrorType = bodyParserErrorType(error);
        if (error instanceof Error && bodyErrorType === 'entity.too.large') {
            const limit = 'limit' in error && typeof error.limit === 'number' ? error.limit : undefined;
            logger.warn('Rejected oversized request body', { limit }, requestId);
            return this.createError(ErrorCode.PAYLOAD_TOO_LARGE, 'Request body exceeds the size limit', { limit });
        }
        if (bodyErrorType !== undefined) {
            logger.warn('Rejected unreadable request body', { type: bodyErrorType }, requestId);
            return this.createError(ErrorCode.INVALID_INPUT, `Request body rejected: ${bodyErrorType}`);
        }

        logger.error('Internal server error', error, undefined, requestId);
        return this.createError(
            ErrorCode.INTERNAL_ERROR,
            error instanceof Error ? error.message : String(error)
        );
    }

    toEnvelope(appError: AppError): ErrorEnvelope {
        return { success: false, error: appError.userMessage };
    }
}

// Singleton instance
const errorHandler = new ErrorHandler();

export default errorHandler;
