import { z } from 'zod';

export const REQUIREMENTS_VERSION = '2.0.0';
export const EXTRACT_PROMPT_VERSION = 'EXTRACT_REQ_V2';
export const MATCH_PROMPT_VERSION = 'MATCH_EVIDENCE_V2';
export const TAILOR_PROMPT_VERSION = 'TAILOR_RESUME_V1';
export const REFINE_PROMPT_VERSION = 'REFINE_RESUME_V1';

export const DEFAULT_JACCARD_THRESHOLD = 0.8;
export const DEFAULT_MIN_QUOTE_LENGTH = 12;

/**
 * Pipeline configuration.
 *
 * Built once at process start and handed to every component that needs it.
 * Nothing below the entry point reads `process.env`.
 */
export interface PipelineConfig {
    apiKey?: string;
    baseUrl?: string;
    extractModel: string;
    matchModel: string;
    tailorModel: string;
    temperature: number;
    topP: number;
    maxTokens: number;
    requestTimeoutMs: number;
    retryDelayMs: number;
    artifactsDir: string;
    reportsDir: string;
    jaccardThreshold: number;
    minQuoteLength: number;
    requirementsVersion: string;
    extractPromptVersion: string;
    matchPromptVersion: string;
    tailorPromptVersion: string;
    refinePromptVersion: string;
    port: number;
}

const optionalString = z
    .string()
    .optional()
    .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
    LLM_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    LLM_BASE_URL: optionalString,
    LLM_MODEL: optionalString,
    LLM_EXTRACT_MODEL: optionalString,
    LLM_MATCH_MODEL: optionalString,
    LLM_TAILOR_MODEL: optionalString,
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    LLM_TOP_P: z.coerce.number().gt(0).max(1).default(1),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
    ARTIFACTS_DIR: z.string().min(1).default('./artifacts'),
    REPORTS_DIR: optionalString,
    JACCARD_THRESHOLD: z.coerce.number().gt(0).max(1).default(DEFAULT_JACCARD_THRESHOLD),
    MIN_QUOTE_LENGTH: z.coerce.number().int().min(1).default(DEFAULT_MIN_QUOTE_LENGTH),
    PORT: z.coerce.number().int().positive().default(3000)
});

/**
 * Parse the pipeline configuration from an environment map.
 * Throws a ZodError when a numeric setting is malformed.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv): PipelineConfig {
    const parsed = envSchema.parse(env);

    return {
        apiKey: parsed.LLM_API_KEY ?? parsed.OPENAI_API_KEY,
        baseUrl: parsed.LLM_BASE_URL,
        extractModel: parsed.LLM_EXTRACT_MODEL ?? parsed.LLM_MODEL ?? 'gpt-4o',
        matchModel: parsed.LLM_MATCH_MODEL ?? parsed.LLM_MODEL ?? 'gpt-4o-mini',
        tailorModel: parsed.LLM_TAILOR_MODEL ?? parsed.LLM_MODEL ?? 'gpt-4o',
        temperature: parsed.LLM_TEMPERATURE,
        topP: parsed.LLM_TOP_P,
        maxTokens: parsed.LLM_MAX_TOKENS,
        requestTimeoutMs: parsed.LLM_TIMEOUT_MS,
        retryDelayMs: parsed.LLM_RETRY_DELAY_MS,
        artifactsDir: parsed.ARTIFACTS_DIR,
        reportsDir: parsed.REPORTS_DIR ?? parsed.ARTIFACTS_DIR,
        jaccardThreshold: parsed.JACCARD_THRESHOLD,
        minQuoteLength: parsed.MIN_QUOTE_LENGTH,
        requirementsVersion: REQUIREMENTS_VERSION,
        extractPromptVersion: EXTRACT_PROMPT_VERSION,
        matchPromptVersion: MATCH_PROMPT_VERSION,
        tailorPromptVersion: TAILOR_PROMPT_VERSION,
        refinePromptVersion: REFINE_PROMPT_VERSION,
        port: parsed.PORT
    };
}

// Singleton instance
let pipelineConfig: PipelineConfig | null = null;

export function getPipelineConfig(): PipelineConfig {
    if (!pipelineConfig) {
        pipelineConfig = loadPipelineConfig(process.env);
    }
    return pipelineConfig;
}
