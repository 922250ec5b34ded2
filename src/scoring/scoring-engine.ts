import { DEFAULT_MIN_QUOTE_LENGTH } from '../config/pipeline-config';
import { EvidenceRequiredError } from '../errors/pipeline-errors';
import { Category, Requirement, RequirementsDocument } from '../types/requirements';
import { CategoryScore, EvidenceMap, Match, ScoreResult } from '../types/evidence';
import { hasQuotedEvidence, validateEvidenceQuotes } from './quote-validator';

/**
 * Scoring Engine
 *
 * Pure scoring over a frozen requirements document and a validated evidence
 * map. No I/O, no model calls; the same inputs always give the same output.
 */

export interface ScoreOptions {
    resumeText?: string;
    minQuoteLength?: number;
}

/**
 * Round to one decimal place, correctly rounded on the exact binary value:
 * only a value that is exactly halfway between two tenths goes to the even
 * tenth (6.25 -> 6.2, 18.75 -> 18.8, while 0.15 is just below half -> 0.1).
 */
export function roundToTenth(value: number): number {
    const magnitude = Math.abs(value);
    if (!Number.isFinite(value) || magnitude >= 1e21) {
        return value;
    }

    // toFixed(100) spells out the double's exact decimal expansion
    const [whole, fraction = ''] = magnitude.toFixed(100).split('.');
    const tenthDigit = fraction.slice(0, 1);
    const tail = fraction.slice(1);

    let rounded: number;
    if (/^50*$/.test(tail)) {
        const tenths = Number(`${whole}${tenthDigit}`);
        rounded = (tenths % 2 === 0 ? tenths : tenths + 1) / 10;
    } else {
        rounded = Number(magnitude.toFixed(1));
    }
    return value < 0 ? -rounded : rounded;
}

export function percentage(part: number, whole: number): number {
    return roundToTenth((part / whole) * 100);
}

/**
 * Throw if any positive match lacks a non-empty evidence quote.
 */
export function assertEvidenceIntegrity(evidenceMap: EvidenceMap): void {
    for (const match of evidenceMap.matches) {
        if (match.matched === true && !hasQuotedEvidence(match)) {
            throw new EvidenceRequiredError(match.requirement_id);
        }
    }
}

/**
 * Integrity gate in front of scoring. With a résumé it re-runs quote
 * validation first and returns the re-validated map.
 */
export function validateEvidenceMap(
    evidenceMap: EvidenceMap,
    options: ScoreOptions = {}
): EvidenceMap {
    const checked = options.resumeText
        ? validateEvidenceQuotes(options.resumeText, evidenceMap, options.minQuoteLength ?? DEFAULT_MIN_QUOTE_LENGTH)
        : evidenceMap;

    assertEvidenceIntegrity(checked);
    return checked;
}

function countMatched(requirements: readonly Requirement[], matchById: ReadonlyMap<string, Match>): number {
    return requirements.filter(requirement => matchById.get(requirement.id)?.matched === true).length;
}

export function computeScore(
    document: RequirementsDocument,
    evidenceMap: EvidenceMap,
    options: ScoreOptions = {}
): ScoreResult {
    const checked = validateEvidenceMap(evidenceMap, options);

    const requirements = document.requirements;
    const matchById = new Map<string, Match>();
    for (const match of checked.matches) {
        matchById.set(match.requirement_id, match);
    }

    const mustHave = requirements.filter(requirement => requirement.must_have);
    const niceToHave = requirements.filter(requirement => !requirement.must_have);
    const mustHaveMatched = countMatched(mustHave, matchById);
    const niceToHaveMatched = countMatched(niceToHave, matchById);

    // Map keeps first-appearance order of categories
    const byCategory = new Map<Category, Requirement[]>();
    for (const requirement of requirements) {
        const bucket = byCategory.get(requirement.category);
        if (bucket) {
            bucket.push(requirement);
        } else {
            byCategory.set(requirement.category, [requirement]);
        }
    }

    const perCategory: Partial<Record<Category, CategoryScore>> = {};
    for (const [category, members] of byCategory) {
        const matched = countMatched(members, matchById);
        perCategory[category] = {
            matched,
            total: members.length,
            pct: members.length > 0 ? percentage(matched, members.length) : 0
        };
    }

    const totalMatched = countMatched(requirements, matchById);

    return {
        must_have_coverage: mustHave.length > 0 ? percentage(mustHaveMatched, mustHave.length) : 100,
        nice_to_have_coverage: niceToHave.length > 0 ? percentage(niceToHaveMatched, niceToHave.length) : 100,
        must_have_matched: mustHaveMatched,
        must_have_total: mustHave.length,
        nice_to_have_matched: niceToHaveMatched,
        nice_to_have_total: niceToHave.length,
        per_category_scores: perCategory,
        overall_score: requirements.length > 0 ? percentage(totalMatched, requirements.length) : 0,
        total_matched: totalMatched,
        total_requirements: requirements.length
    };
}
