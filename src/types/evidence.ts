import { Category } from './requirements';

/**
 * Evidence and scoring data model.
 *
 * EvidenceMap is persisted as a write-only audit artifact; ScoreResult is
 * derived and never stored on its own.
 */

export interface EvidenceItem {
    quote: string;
    resume_section?: string;
    years_experience?: number | null;
}

export interface Match {
    requirement_id: string;
    requirement_key?: string;
    matched: boolean;
    evidence: EvidenceItem[];
    notes: string;
    invalid_quote: boolean;
}

export interface ValidationMeta {
    matched_count_raw: number;
    matched_count_validated: number;
    invalid_quote_count: number;
    evidence_prompt_includes_description: false;
}

export interface EvidenceMap {
    role_id: string;
    jd_hash: string;
    resume_hash: string;
    requirements_version: string;
    prompt_version: string;
    model_id: string;
    run_id: string;
    matches: Match[];
    meta: ValidationMeta;
}

export interface CategoryScore {
    matched: number;
    total: number;
    pct: number;
}

export interface ScoreResult {
    must_have_coverage: number;
    nice_to_have_coverage: number;
    must_have_matched: number;
    must_have_total: number;
    nice_to_have_matched: number;
    nice_to_have_total: number;
    per_category_scores: Partial<Record<Category, CategoryScore>>;
    overall_score: number;
    total_matched: number;
    total_requirements: number;
}

export interface RunReport {
    run_id: string;
    timestamp: string;
    role_id: string;
    jd_hash: string;
    resume_hash: string;
    requirements_version: string;
    prompt_version: string;
    model_id: string;
    total_requirements: number;
    total_matched: number;
    must_have_coverage: number;
    nice_to_have_coverage: number;
    overall_score: number;
    per_category_scores: Partial<Record<Category, CategoryScore>>;
}

/**
 * One match entry as the generation model returned it, before coercion and
 * reconciliation against the canonical requirement list.
 */
export interface RawMatch {
    requirement_id?: unknown;
    requirement_key?: unknown;
    matched?: unknown;
    evidence?: unknown;
    notes?: unknown;
    confidence?: unknown;
}
