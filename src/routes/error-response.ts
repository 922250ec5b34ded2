import multer from 'multer';
import { z } from 'zod';
import { isPipelineError, PipelineErrorCode } from '../errors/pipeline-errors';

export interface ErrorResponse {
    status: number;
    body: {
        error: string;
        code?: PipelineErrorCode;
        message?: string;
        details?: unknown;
    };
}

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
    REQUIREMENTS_MISSING: 409,
    API_KEY_MISSING: 400,
    UNSUPPORTED_FILE_TYPE: 400,
    EVIDENCE_REQUIRED: 422,
    SCHEMA_VIOLATION: 422,
    GENERATION_FAILED: 502
};

/**
 * Map an error raised while serving a request to an HTTP status and body.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof z.ZodError) {
        return {
            status: 400,
            body: { error: 'Validation failed', details: error.errors }
        };
    }

    if (error instanceof multer.MulterError) {
        return {
            status: 400,
            body: { error: 'Upload rejected', message: error.message }
        };
    }

    if (isPipelineError(error)) {
        if (error.code === 'REQUIREMENTS_MISSING') {
            return {
                status: STATUS_BY_CODE[error.code],
                body: {
                    error: 'Requirements artifact missing. Run POST /requirements/build first with the same JD.',
                    code: error.code
                }
            };
        }
        return {
            status: STATUS_BY_CODE[error.code],
            body: { error: error.message, code: error.code }
        };
    }

    return {
        status: 500,
        body: {
            error: 'Request failed',
            message: error instanceof Error ? error.message : 'Unknown error'
        }
    };
}
