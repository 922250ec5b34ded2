import { hashText } from '../utils/hash.util';
import { DEFAULT_JACCARD_THRESHOLD } from '../config/pipeline-config';
import {
    CATEGORY_PRECEDENCE,
    Category,
    RawRequirement,
    Requirement,
    isCategory
} from '../types/requirements';

/**
 * Requirements Normalizer
 *
 * Turns the untrusted requirement list from the extraction model into a
 * canonical one: slugged keys, a single category per requirement, merged
 * near-duplicates, content-derived ids and a fixed ordering. It never
 * rejects input; anything malformed falls back to a default.
 *
 * Category resolution is a keyword policy. Terminology that no table
 * covers lands in `Technical`.
 */

export const CATEGORY_KEYWORDS: Record<Category, readonly string[]> = {
    AI: ['llm', 'genai', 'machine learning', 'ml', 'model', 'inference', 'prompt', 'evaluation', 'retrieval', 'nlp'],
    Systems: ['distributed', 'scalability', 'reliability', 'services', 'architecture', 'microservices'],
    Infrastructure: ['k8s', 'kubernetes', 'terraform', 'ci/cd', 'observability', 'monitoring', 'docker', 'aws', 'gcp'],
    Technical: ['typescript', 'python', 'node', 'react', 'sql', 'api', 'fastapi', 'django', 'postgresql'],
    Domain: ['healthcare', 'fintech', 'gov', 'compliance', 'mental health', 'patient'],
    Collaboration: ['cross-functional', 'stakeholders', 'clinicians', 'product', 'designers'],
    Behavioral: ['ownership', 'leadership', 'mentoring', 'communication', 'mentorship']
};

const DEFAULT_CATEGORY: Category = 'Technical';
const DEFAULT_WEIGHT = 3;

export interface NormalizeOptions {
    jaccardThreshold?: number;
}

interface RequirementGroup {
    requirement_key: string;
    category: Category;
    name: string;
    description: string;
    must_have: boolean;
    weight: number;
    aliases: string[];
    tokens: Set<string>;
}

/**
 * Lowercase, collapse every run of non-alphanumerics to `_`, trim `_`.
 */
export function slugify(value: string): string {
    const slug = value
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/_+/g, '_')
        .replace(/^_+|_+$/g, '');
    return slug || 'unknown';
}

export function resolveCategory(rawCategory: unknown, name: string, description: string): Category {
    const trimmed = typeof rawCategory === 'string' ? rawCategory.trim() : '';
    if (isCategory(trimmed)) {
        return trimmed;
    }

    const combined = `${name} ${description}`.toLowerCase();
    for (const category of CATEGORY_PRECEDENCE) {
        if (CATEGORY_KEYWORDS[category].some(keyword => combined.includes(keyword))) {
            return category;
        }
    }
    return DEFAULT_CATEGORY;
}

export function resolveMustHave(raw: RawRequirement): boolean {
    const importance = raw.importance !== undefined ? raw.importance : raw.must_have !== undefined ? raw.must_have : true;

    if (typeof importance === 'string') {
        const lowered = importance.toLowerCase();
        return lowered.includes('must') || lowered.includes('required');
    }
    return Boolean(importance);
}

export function resolveWeight(rawWeight: unknown): number {
    if (typeof rawWeight === 'number' && Number.isInteger(rawWeight) && rawWeight >= 1 && rawWeight <= 5) {
        return rawWeight;
    }
    return DEFAULT_WEIGHT;
}

/**
 * Deduplicate while keeping first-seen order.
 */
export function dedupeOrdered(values: readonly string[]): string[] {
    return Array.from(new Set(values));
}

function resolveAliases(rawAliases: unknown): string[] {
    if (!Array.isArray(rawAliases)) {
        return [];
    }
    return dedupeOrdered(rawAliases.filter((alias): alias is string => typeof alias === 'string'));
}

export function tokenSet(text: string): Set<string> {
    return new Set(text.toLowerCase().match(/[a-z0-9]+/g) ?? []);
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 || b.size === 0) {
        return 0;
    }
    let intersection = 0;
    for (const token of a) {
        if (b.has(token)) {
            intersection++;
        }
    }
    const union = a.size + b.size - intersection;
    return union === 0 ? 0 : intersection / union;
}

/**
 * `REQ-` plus the first 10 hex chars of SHA-256(`key|category|must_have`).
 */
export function stableRequirementId(requirementKey: string, category: Category, mustHave: boolean): string {
    const digest = hashText(`${requirementKey}|${category}|${mustHave}`);
    return `REQ-${digest.slice(0, 10)}`;
}

function toGroup(raw: RawRequirement): RequirementGroup | null {
    const name = typeof raw.name === 'string' ? raw.name.trim() : '';
    if (!name) {
        return null;
    }

    const description = typeof raw.description === 'string' ? raw.description.trim() : '';
    const explicitKey = typeof raw.requirement_key === 'string' ? raw.requirement_key : '';

    return {
        requirement_key: slugify(explicitKey || name),
        category: resolveCategory(raw.category, name, description),
        name,
        description,
        must_have: resolveMustHave(raw),
        weight: resolveWeight(raw.weight),
        aliases: resolveAliases(raw.aliases),
        tokens: new Set([...tokenSet(name), ...tokenSet(description)])
    };
}

function mergeInto(target: RequirementGroup, incoming: RequirementGroup): void {
    if (incoming.name.length > target.name.length) {
        target.name = incoming.name;
        target.tokens = new Set([...tokenSet(target.name), ...tokenSet(target.description)]);
    }
    target.aliases = dedupeOrdered([...target.aliases, ...incoming.aliases]);
    target.must_have = target.must_have || incoming.must_have;
}

export function compareRequirements(a: Requirement, b: Requirement): number {
    if (a.must_have !== b.must_have) {
        return a.must_have ? -1 : 1;
    }
    const precedence = CATEGORY_PRECEDENCE.indexOf(a.category) - CATEGORY_PRECEDENCE.indexOf(b.category);
    if (precedence !== 0) {
        return precedence;
    }
    if (a.requirement_key < b.requirement_key) {
        return -1;
    }
    return a.requirement_key > b.requirement_key ? 1 : 0;
}

/**
 * Canonicalize raw requirements. Output order is fixed by must_have
 * (musts first), category precedence and requirement_key.
 */
export function normalizeRequirements(
    rawRequirements: readonly RawRequirement[],
    options: NormalizeOptions = {}
): Requirement[] {
    const threshold = options.jaccardThreshold ?? DEFAULT_JACCARD_THRESHOLD;
    const groups: RequirementGroup[] = [];

    for (const raw of rawRequirements) {
        const current = toGroup(raw);
        if (!current) {
            continue;
        }

        const existing = groups.find(group =>
            group.requirement_key === current.requirement_key ||
            jaccard(current.tokens, group.tokens) >= threshold
        );

        if (existing) {
            mergeInto(existing, current);
        } else {
            groups.push(current);
        }
    }

    const requirements: Requirement[] = groups.map(group => ({
        id: stableRequirementId(group.requirement_key, group.category, group.must_have),
        requirement_key: group.requirement_key,
        category: group.category,
        name: group.name,
        description: group.description,
        must_have: group.must_have,
        weight: group.weight,
        aliases: group.aliases
    }));

    return requirements.sort(compareRequirements);
}
