/**
 * Pipeline error taxonomy.
 *
 * Every error the pipeline raises on purpose carries a stable `code` so the
 * HTTP layer can map it to a response without string matching.
 */
export type PipelineErrorCode =
    | 'GENERATION_FAILED'
    | 'REQUIREMENTS_MISSING'
    | 'EVIDENCE_REQUIRED'
    | 'SCHEMA_VIOLATION'
    | 'API_KEY_MISSING'
    | 'UNSUPPORTED_FILE_TYPE';

export type GenerationStage = 'extract' | 'match' | 'tailor' | 'refine';

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly code: PipelineErrorCode,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

/**
 * The generation model failed (call error, empty content, invalid JSON or
 * an off-contract payload) on every allowed attempt.
 */
export class GenerationFailedError extends PipelineError {
    constructor(
        public readonly stage: GenerationStage,
        public readonly attempts: number,
        cause: string
    ) {
        super(
            `Generation failed after ${attempts} attempts (${stage}): ${cause}`,
            'GENERATION_FAILED',
            { stage, attempts }
        );
        this.name = 'GenerationFailedError';
    }
}

/**
 * No frozen requirements document exists for the requested JD. Callers must
 * build requirements first; nothing regenerates them implicitly.
 */
export class RequirementsMissingError extends PipelineError {
    constructor(
        public readonly jdHash: string,
        public readonly roleId?: string
    ) {
        super(
            `Requirements artifact not found for jd_hash=${jdHash.slice(0, 16)}...` +
            (roleId ? ` (role_id=${roleId})` : '') +
            '. Build requirements first with the same JD. No automatic regeneration.',
            'REQUIREMENTS_MISSING',
            { jdHash, roleId }
        );
        this.name = 'RequirementsMissingError';
    }
}

/**
 * A match claims `matched = true` without a usable evidence quote.
 */
export class EvidenceRequiredError extends PipelineError {
    constructor(public readonly requirementId: string) {
        super(
            `Requirement ${requirementId} has matched=true but no evidence quote`,
            'EVIDENCE_REQUIRED',
            { requirementId }
        );
        this.name = 'EvidenceRequiredError';
    }
}

export class SchemaViolationError extends PipelineError {
    constructor(
        public readonly artifact: 'requirements' | 'evidence_map',
        public readonly issues: string[]
    ) {
        super(
            `Invalid ${artifact} artifact: ${issues.join('; ')}`,
            'SCHEMA_VIOLATION',
            { artifact, issues }
        );
        this.name = 'SchemaViolationError';
    }
}

export class ApiKeyMissingError extends PipelineError {
    constructor() {
        super(
            'LLM_API_KEY is not set. Add it to .env in the project root.',
            'API_KEY_MISSING'
        );
        this.name = 'ApiKeyMissingError';
    }
}

/**
 * An upload whose extension is neither `.pdf` nor `.txt`.
 */
export class UnsupportedFileTypeError extends PipelineError {
    constructor(public readonly filename: string, extension: string) {
        super(
            `Unsupported file type: ${extension || '(none)'}. Only PDF and TXT files are allowed`,
            'UNSUPPORTED_FILE_TYPE',
            { filename, extension }
        );
        this.name = 'UnsupportedFileTypeError';
    }
}

export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}
