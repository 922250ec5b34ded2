import { EvaluationResult, Provenance } from '../types/pipeline';

/**
 * Repeatability check: the same JD and résumé evaluated several times
 * against one frozen requirements artifact should agree on every run.
 */

export type MatchPair = [requirementId: string, matched: boolean];

export interface RunFingerprint {
    run: number;
    run_id: string;
    match_score: number;
    num_requirements: number;
    matched_count_raw: number;
    matched_count_validated: number;
    invalid_quote_count: number;
    requirements_hash: string;
    match_pairs: MatchPair[];
}

export type VarianceField = 'match_score' | 'invalid_quote_count' | 'requirement_ids' | 'match_pairs';

export interface RunVariance {
    run: number;
    field: VarianceField;
    detail: string;
}

export interface RepeatabilityReport {
    runs: number;
    stable: boolean;
    score_range: { min: number; max: number };
    variances: RunVariance[];
    provenance: Provenance;
    metrics: {
        match_score: number;
        num_requirements: number;
        matched_count_raw: number;
        matched_count_validated: number;
        invalid_quote_count: number;
        raw_vs_validated_delta: number;
    };
    fingerprints: RunFingerprint[];
}

// Variance details list at most this many differing ids
const MAX_DETAIL_ITEMS = 5;

export function fingerprintRun(run: number, result: EvaluationResult): RunFingerprint {
    const matchPairs = result.gap_report
        .map((entry): MatchPair => [entry.id, entry.status === 'MATCH'])
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));

    return {
        run,
        run_id: result.run_id,
        match_score: result.match_score,
        num_requirements: result.evidence_summary.num_requirements,
        matched_count_raw: result.evidence_summary.matched_count_raw,
        matched_count_validated: result.evidence_summary.matched_count_validated,
        invalid_quote_count: result.evidence_summary.invalid_quote_count,
        requirements_hash: result.provenance.requirements_hash,
        match_pairs: matchPairs
    };
}

function sameIds(left: readonly string[], right: readonly string[]): boolean {
    return left.length === right.length && left.every((id, index) => id === right[index]);
}

function compareToBaseline(baseline: RunFingerprint, candidate: RunFingerprint): RunVariance[] {
    const variances: RunVariance[] = [];
    const run = candidate.run;

    if (candidate.match_score !== baseline.match_score) {
        variances.push({ run, field: 'match_score', detail: `${candidate.match_score} != ${baseline.match_score}` });
    }
    if (candidate.invalid_quote_count !== baseline.invalid_quote_count) {
        variances.push({
            run,
            field: 'invalid_quote_count',
            detail: `${candidate.invalid_quote_count} != ${baseline.invalid_quote_count}`
        });
    }

    const baselineIds = baseline.match_pairs.map(([id]) => id);
    const candidateIds = candidate.match_pairs.map(([id]) => id);
    if (!sameIds(baselineIds, candidateIds)) {
        const baselineSet = new Set(baselineIds);
        const candidateSet = new Set(candidateIds);
        const differing = [
            ...candidateIds.filter(id => !baselineSet.has(id)),
            ...baselineIds.filter(id => !candidateSet.has(id))
        ];
        variances.push({
            run,
            field: 'requirement_ids',
            detail: `diff: ${differing.slice(0, MAX_DETAIL_ITEMS).join(', ')}`
        });
        return variances;
    }

    const flipped = candidate.match_pairs
        .filter(([, matched], index) => matched !== baseline.match_pairs[index]?.[1])
        .map(([id, matched]) => `${id} ${String(!matched)}->${String(matched)}`);
    if (flipped.length > 0) {
        variances.push({
            run,
            field: 'match_pairs',
            detail: `first diffs: ${flipped.slice(0, MAX_DETAIL_ITEMS).join(', ')}`
        });
    }

    return variances;
}

/**
 * Compare every run with the first one. Requires at least one result.
 */
export function compareRuns(results: readonly EvaluationResult[]): RepeatabilityReport {
    const [first] = results;
    if (!first) {
        throw new Error('Repeatability check needs at least one run');
    }

    const fingerprints = results.map((result, index) => fingerprintRun(index + 1, result));
    const [baseline, ...rest] = fingerprints;
    const variances = rest.flatMap(candidate => compareToBaseline(baseline, candidate));
    const scores = fingerprints.map(fingerprint => fingerprint.match_score);

    return {
        runs: results.length,
        stable: variances.length === 0,
        score_range: { min: Math.min(...scores), max: Math.max(...scores) },
        variances,
        provenance: first.provenance,
        metrics: {
            match_score: baseline.match_score,
            num_requirements: baseline.num_requirements,
            matched_count_raw: baseline.matched_count_raw,
            matched_count_validated: baseline.matched_count_validated,
            invalid_quote_count: baseline.invalid_quote_count,
            raw_vs_validated_delta: baseline.matched_count_raw - baseline.matched_count_validated
        },
        fingerprints
    };
}
