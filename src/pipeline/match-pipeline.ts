import { logger, errorFields, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';
import { ApiKeyMissingError, RequirementsMissingError } from '../errors/pipeline-errors';
import { computeScore } from '../scoring/scoring-engine';
import { getOpenAIService } from '../services/openai.service';
import { EvidenceMap } from '../types/evidence';
import {
    BuildRequirementsResult,
    EvaluationResult,
    GapReportEntry,
    Importance,
    ResumeSignal
} from '../types/pipeline';
import { Requirement, RequirementsDocument } from '../types/requirements';
import { canonicalJson, hashPrefix, hashText } from '../utils/hash.util';
import { ArtifactStore, IArtifactStore, LoadedRequirements } from './artifact-store';
import { EvidenceMatcher, IEvidenceMatcher } from './evidence-matcher';
import { compareRuns, RepeatabilityReport } from './repeatability';
import { IRequirementsExtractor, RequirementsExtractor } from './requirements-extractor';
import { buildRunReport } from './run-report';

export interface IMatchPipeline {
    buildRequirements(jdText: string, roleId?: string): Promise<BuildRequirementsResult>;
    evaluate(jdText: string, resumeText: string): Promise<EvaluationResult>;
    checkRepeatability(jdText: string, resumeText: string, runs: number): Promise<RepeatabilityReport>;
}

export const MAX_REPEATABILITY_RUNS = 20;

function importanceOf(requirement: Requirement): Importance {
    return requirement.must_have ? 'Must-have' : 'Nice-to-have';
}

/**
 * Per-requirement status with the first surviving quote.
 */
export function buildGapReport(document: RequirementsDocument, evidenceMap: EvidenceMap): GapReportEntry[] {
    const matchById = new Map(evidenceMap.matches.map(match => [match.requirement_id, match] as const));

    return document.requirements.map((requirement): GapReportEntry => {
        const match = matchById.get(requirement.id);
        const matched = match?.matched === true;
        const firstQuote = match?.evidence[0]?.quote;

        return {
            id: requirement.id,
            category: requirement.category,
            name: requirement.name,
            description: requirement.description,
            importance: importanceOf(requirement),
            status: matched ? 'MATCH' : requirement.must_have ? 'MISSING' : 'GAP',
            evidence: firstQuote ? firstQuote : 'No evidence found.'
        };
    });
}

export function buildResumeSignals(document: RequirementsDocument, evidenceMap: EvidenceMap): ResumeSignal[] {
    const requirementById = new Map(document.requirements.map(requirement => [requirement.id, requirement] as const));
    const signals: ResumeSignal[] = [];

    for (const match of evidenceMap.matches) {
        const first = match.evidence[0];
        const requirement = requirementById.get(match.requirement_id);
        if (!match.matched || !first || !requirement) {
            continue;
        }

        const signal: ResumeSignal = {
            category: requirement.category,
            name: requirement.name,
            evidence: first.quote
        };
        if (first.years_experience !== undefined) {
            signal.years_experience = first.years_experience;
        }
        signals.push(signal);
    }
    return signals;
}

/**
 * Match Pipeline
 *
 * Composes extraction, normalization, artifact storage, evidence matching
 * and scoring into the two operations front ends call. Evaluation only ever
 * runs against a requirements document that was built and frozen earlier.
 */
export class MatchPipeline implements IMatchPipeline {
    constructor(
        private extractor: IRequirementsExtractor,
        private matcher: IEvidenceMatcher,
        private store: IArtifactStore,
        private logger: ILogger,
        private config: PipelineConfig
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: PipelineConfig): MatchPipeline {
        const openai = getOpenAIService(config);

        return new MatchPipeline(
            RequirementsExtractor.create(openai, config),
            EvidenceMatcher.create(openai, config),
            ArtifactStore.create(config),
            logger,
            config
        );
    }

    /**
     * Freeze the requirements for a JD. An existing document for the same
     * JD text is returned unchanged rather than re-extracted.
     */
    async buildRequirements(jdText: string, roleId?: string): Promise<BuildRequirementsResult> {
        this.requireApiKey();
        const jdHash = hashText(jdText);

        try {
            const existing = await this.findRequirements(jdHash);
            if (existing) {
                this.logger.info({
                    jdHash: hashPrefix(jdHash),
                    roleId: existing.document.role_id
                }, 'Requirements artifact already exists, skipping extraction');

                return {
                    jd_hash: existing.document.jd_hash,
                    role_id: existing.document.role_id,
                    num_requirements: existing.document.requirements.length,
                    artifact_path: existing.path,
                    requirements_source: 'artifact'
                };
            }

            const { document, audit } = await this.extractor.extract(jdText, roleId);
            const artifactPath = await this.store.saveRequirements(document);

            this.logger.info({
                jdHash: hashPrefix(document.jd_hash),
                roleId: document.role_id,
                numRequirements: document.requirements.length,
                promptVersion: audit.prompt_version,
                promptHash: hashPrefix(audit.prompt_hash),
                model: audit.model_id
            }, 'Requirements artifact built');

            return {
                jd_hash: document.jd_hash,
                role_id: document.role_id,
                num_requirements: document.requirements.length,
                artifact_path: artifactPath,
                requirements_source: 'extracted'
            };

        } catch (error: unknown) {
            this.logger.error({ jdHash: hashPrefix(jdHash), ...errorFields(error) }, 'Requirements build failed');
            throw error;
        }
    }

    /**
     * Score a résumé against the frozen requirements for `jdText`. Fails with
     * RequirementsMissingError when none were built; nothing is extracted here.
     */
    async evaluate(jdText: string, resumeText: string): Promise<EvaluationResult> {
        this.requireApiKey();
        const jdHash = hashText(jdText);
        const resumeHash = hashText(resumeText);

        this.logger.info({
            jdHash: hashPrefix(jdHash),
            resumeHash: hashPrefix(resumeHash),
            jdChars: jdText.length,
            resumeChars: resumeText.length
        }, 'Evaluation started');

        try {
            const { document, path: requirementsPath } = await this.store.loadRequirementsByJdHash(jdHash);
            const { evidenceMap, audit } = await this.matcher.match(resumeText, document);
            const evidencePath = await this.store.saveEvidenceMap(evidenceMap);

            const score = computeScore(document, evidenceMap, {
                resumeText,
                minQuoteLength: this.config.minQuoteLength
            });

            const runReportPath = await this.store.saveRunReport(buildRunReport(document, evidenceMap, score));
            const matchScore = Math.round(score.overall_score);

            this.logger.info({
                runId: evidenceMap.run_id,
                matchScore,
                totalMatched: score.total_matched,
                totalRequirements: score.total_requirements,
                invalidQuotes: evidenceMap.meta.invalid_quote_count
            }, 'Evaluation completed');

            return {
                run_id: evidenceMap.run_id,
                match_score: matchScore,
                score,
                evidence_summary: {
                    matched_count: score.total_matched,
                    matched_count_raw: evidenceMap.meta.matched_count_raw,
                    matched_count_validated: evidenceMap.meta.matched_count_validated,
                    invalid_quote_count: evidenceMap.meta.invalid_quote_count,
                    num_requirements: document.requirements.length
                },
                provenance: {
                    jd_hash: jdHash,
                    resume_hash: resumeHash,
                    requirements_version: document.requirements_version,
                    requirements_hash: hashText(canonicalJson(document)),
                    requirements_artifact_path: requirementsPath,
                    requirements_source: 'artifact'
                },
                audit: {
                    prompt_version: audit.prompt_version,
                    prompt_hash: audit.prompt_hash,
                    model_id: audit.model_id,
                    model_params: audit.model_params
                },
                gap_report: buildGapReport(document, evidenceMap),
                jd_analysis: {
                    role_title: document.role_title,
                    requirements: document.requirements.map(requirement => ({
                        category: requirement.category,
                        name: requirement.name,
                        importance: importanceOf(requirement),
                        description: requirement.description
                    }))
                },
                resume_analysis: {
                    signals: buildResumeSignals(document, evidenceMap)
                },
                evidence_artifact_path: evidencePath,
                run_report_path: runReportPath
            };

        } catch (error: unknown) {
            if (error instanceof RequirementsMissingError) {
                this.logger.warn({ jdHash: hashPrefix(jdHash) }, 'Evaluation refused: requirements artifact missing');
            } else {
                this.logger.error({ jdHash: hashPrefix(jdHash), ...errorFields(error) }, 'Evaluation failed');
            }
            throw error;
        }
    }

    /**
     * Evaluate the same pair `runs` times in sequence and report any run
     * that disagrees with the first. Requirements must already be built.
     */
    async checkRepeatability(jdText: string, resumeText: string, runs: number): Promise<RepeatabilityReport> {
        if (!Number.isInteger(runs) || runs < 1 || runs > MAX_REPEATABILITY_RUNS) {
            throw new RangeError(`runs must be an integer from 1 to ${MAX_REPEATABILITY_RUNS}`);
        }

        const results: EvaluationResult[] = [];
        for (let run = 1; run <= runs; run++) {
            results.push(await this.evaluate(jdText, resumeText));
        }

        const report = compareRuns(results);
        const logFields = {
            runs,
            jdHash: hashPrefix(report.provenance.jd_hash),
            scoreMin: report.score_range.min,
            scoreMax: report.score_range.max,
            variances: report.variances.length
        };
        if (report.stable) {
            this.logger.info(logFields, 'Repeatability check passed');
        } else {
            this.logger.warn(logFields, 'Repeatability check found variance');
        }
        return report;
    }

    private requireApiKey(): void {
        if (!this.config.apiKey) {
            throw new ApiKeyMissingError();
        }
    }

    private async findRequirements(jdHash: string): Promise<LoadedRequirements | null> {
        try {
            return await this.store.loadRequirementsByJdHash(jdHash);
        } catch (error: unknown) {
            if (error instanceof RequirementsMissingError) {
                return null;
            }
            throw error;
        }
    }
}

// Singleton instance
let matchPipeline: MatchPipeline | null = null;

export function getMatchPipeline(config: PipelineConfig): MatchPipeline {
    if (!matchPipeline) {
        matchPipeline = MatchPipeline.create(config);
    }
    return matchPipeline;
}
