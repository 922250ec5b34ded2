/**
 * Requirement data model.
 *
 * These interfaces describe the frozen requirements artifact exactly as it
 * is persisted, so field names follow the JSON wire format.
 */

// Precedence order: earlier categories win keyword ties.
export const CATEGORY_PRECEDENCE = [
    'AI',
    'Systems',
    'Infrastructure',
    'Technical',
    'Domain',
    'Collaboration',
    'Behavioral'
] as const;

export type Category = typeof CATEGORY_PRECEDENCE[number];

export interface Requirement {
    id: string;
    requirement_key: string;
    category: Category;
    name: string;
    description: string;
    must_have: boolean;
    weight: number; // integer 1-5
    aliases: string[];
}

export interface RequirementsDocument {
    role_id: string;
    jd_hash: string;
    requirements_version: string;
    created_at: string;
    role_title: string;
    requirements: Requirement[];
}

/**
 * One requirement as the generation model returned it. Every field is
 * untrusted until the normalizer has resolved it.
 */
export interface RawRequirement {
    name?: unknown;
    requirement_key?: unknown;
    category?: unknown;
    description?: unknown;
    must_have?: unknown;
    importance?: unknown;
    weight?: unknown;
    aliases?: unknown;
}

/**
 * Audit metadata of one generation call. Kept beside the artifact it
 * produced, never inside it.
 */
export interface GenerationAudit {
    prompt_version: string;
    prompt_hash: string;
    model_id: string;
    model_params: {
        temperature: number;
        top_p: number;
    };
    attempts: number;
}

export function isCategory(value: unknown): value is Category {
    return CATEGORY_PRECEDENCE.some(category => category === value);
}
