import { z } from 'zod';
import { RawRequirement } from '../types/requirements';
import { RawMatch } from '../types/evidence';
import { formatIssues } from './artifact.schema';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawRequirement(value: unknown): value is RawRequirement {
    return isRecord(value);
}

function isRawMatch(value: unknown): value is RawMatch {
    return isRecord(value);
}

// Entries that are not objects are dropped; the shape inside each entry is
// left for the normalizer and matcher to resolve.
export const extractionPayloadSchema = z.object({
    role_title: z.unknown().transform(value => (typeof value === 'string' ? value.trim() : '')),
    requirements: z
        .array(z.unknown())
        .nullish()
        .transform(items => (items ?? []).filter(isRawRequirement))
});

export const matchPayloadSchema = z.object({
    matches: z
        .array(z.unknown())
        .nullish()
        .transform(items => (items ?? []).filter(isRawMatch))
});

export const tailoredResumePayloadSchema = z.object({
    tailored_text: z.string().trim().min(1, 'tailored_text is empty')
});

/**
 * Parse raw model output as JSON and check it against `schema`.
 * Throws on invalid JSON or an off-contract payload; callers run this
 * inside the retry combinator.
 */
export function parseModelJson<S extends z.ZodTypeAny>(raw: string, schema: S): z.infer<S> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw.trim());
    } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Model returned invalid JSON: ${reason}`);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`Model payload did not match contract: ${formatIssues(result.error).join('; ')}`);
    }
    return result.data;
}
