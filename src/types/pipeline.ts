import { ScoreResult } from './evidence';
import { Category, GenerationAudit } from './requirements';

/**
 * Results returned by MatchPipeline to its front ends.
 */

export type RequirementsSource = 'artifact' | 'extracted';

export interface BuildRequirementsResult {
    jd_hash: string;
    role_id: string;
    num_requirements: number;
    artifact_path: string;
    requirements_source: RequirementsSource;
}

export type GapStatus = 'MATCH' | 'MISSING' | 'GAP';
export type Importance = 'Must-have' | 'Nice-to-have';

export interface GapReportEntry {
    id: string;
    category: Category;
    name: string;
    description: string;
    importance: Importance;
    status: GapStatus;
    evidence: string;
}

export interface ResumeSignal {
    category: Category;
    name: string;
    evidence: string;
    years_experience?: number | null;
}

export interface EvidenceSummary {
    matched_count: number;
    matched_count_raw: number;
    matched_count_validated: number;
    invalid_quote_count: number;
    num_requirements: number;
}

export interface Provenance {
    jd_hash: string;
    resume_hash: string;
    requirements_version: string;
    requirements_hash: string;
    requirements_artifact_path: string;
    requirements_source: 'artifact';
}

export interface EvaluationResult {
    run_id: string;
    match_score: number;
    score: ScoreResult;
    evidence_summary: EvidenceSummary;
    provenance: Provenance;
    audit: Omit<GenerationAudit, 'attempts'>;
    gap_report: GapReportEntry[];
    jd_analysis: {
        role_title: string;
        requirements: Array<{
            category: Category;
            name: string;
            importance: Importance;
            description: string;
        }>;
    };
    resume_analysis: {
        signals: ResumeSignal[];
    };
    evidence_artifact_path: string;
    run_report_path: string;
}
