import { EvidenceMap, RunReport, ScoreResult } from '../types/evidence';
import { RequirementsDocument } from '../types/requirements';
import { isoNow } from '../utils/hash.util';

/**
 * Run report for one evaluation: hashes, versions, counts and scores.
 * Carries no résumé or JD text.
 */
export function buildRunReport(
    document: RequirementsDocument,
    evidenceMap: EvidenceMap,
    score: ScoreResult,
    now: Date = new Date()
): RunReport {
    return {
        run_id: evidenceMap.run_id,
        timestamp: isoNow(now),
        role_id: document.role_id,
        jd_hash: document.jd_hash,
        resume_hash: evidenceMap.resume_hash,
        requirements_version: document.requirements_version,
        prompt_version: evidenceMap.prompt_version,
        model_id: evidenceMap.model_id,
        total_requirements: score.total_requirements,
        total_matched: score.total_matched,
        must_have_coverage: score.must_have_coverage,
        nice_to_have_coverage: score.nice_to_have_coverage,
        overall_score: score.overall_score,
        per_category_scores: score.per_category_scores
    };
}
