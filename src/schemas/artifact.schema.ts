import { z } from 'zod';
import { CATEGORY_PRECEDENCE, RequirementsDocument } from '../types/requirements';
import { EvidenceMap } from '../types/evidence';
import { SchemaViolationError } from '../errors/pipeline-errors';

/**
 * Structural contracts for persisted artifacts. A document that fails these
 * checks is never written, and a file on disk that fails them is never used.
 */

const sha256Hex = z.string().regex(/^[0-9a-f]{64}$/, 'must be a lowercase SHA-256 hex digest');

export const requirementSchema = z.object({
    id: z.string().regex(/^REQ-[0-9a-f]+$/, 'must be a REQ- identifier'),
    requirement_key: z.string().regex(/^[a-z0-9_]+$/, 'must be a slug'),
    category: z.enum(CATEGORY_PRECEDENCE),
    name: z.string().min(1),
    description: z.string(),
    must_have: z.boolean(),
    weight: z.number().int().min(1).max(5),
    aliases: z.array(z.string())
}).strict();

export const requirementsDocumentSchema = z.object({
    role_id: z.string().min(1),
    jd_hash: sha256Hex,
    requirements_version: z.string().min(1),
    created_at: z.string().datetime(),
    role_title: z.string(),
    requirements: z.array(requirementSchema)
}).strict();

export const evidenceItemSchema = z.object({
    quote: z.string(),
    resume_section: z.string().optional(),
    years_experience: z.number().nullable().optional()
});

export const matchSchema = z.object({
    requirement_id: z.string(),
    requirement_key: z.string().optional(),
    matched: z.boolean(),
    evidence: z.array(evidenceItemSchema),
    notes: z.string(),
    invalid_quote: z.boolean()
});

export const evidenceMapSchema = z.object({
    role_id: z.string(),
    jd_hash: sha256Hex,
    resume_hash: sha256Hex,
    requirements_version: z.string(),
    prompt_version: z.string(),
    model_id: z.string(),
    run_id: z.string().min(1),
    matches: z.array(matchSchema),
    meta: z.object({
        matched_count_raw: z.number().int().min(0),
        matched_count_validated: z.number().int().min(0),
        invalid_quote_count: z.number().int().min(0),
        evidence_prompt_includes_description: z.literal(false)
    })
});

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${location}: ${issue.message}`;
    });
}

export function validateRequirementsDocument(data: unknown): RequirementsDocument {
    const result = requirementsDocumentSchema.safeParse(data);
    if (!result.success) {
        throw new SchemaViolationError('requirements', formatIssues(result.error));
    }
    return result.data;
}

export function validateEvidenceMap(data: unknown): EvidenceMap {
    const result = evidenceMapSchema.safeParse(data);
    if (!result.success) {
        throw new SchemaViolationError('evidence_map', formatIssues(result.error));
    }
    return result.data;
}
