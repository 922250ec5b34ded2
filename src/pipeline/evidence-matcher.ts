import * as crypto from 'crypto';
import { logger, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';
import { GenerationFailedError } from '../errors/pipeline-errors';
import { matchPayloadSchema, parseModelJson } from '../schemas/model-payload.schema';
import { IOpenAIService } from '../services/openai.service';
import { validateEvidenceQuotes } from '../scoring/quote-validator';
import { EvidenceItem, EvidenceMap, Match, RawMatch } from '../types/evidence';
import { GenerationAudit, Requirement, RequirementsDocument } from '../types/requirements';
import { hashPrefix, hashText } from '../utils/hash.util';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';
import { loadPrompt, renderPrompt } from './prompt-templates';

export interface MatchResult {
    evidenceMap: EvidenceMap;
    audit: GenerationAudit;
}

export interface IEvidenceMatcher {
    match(resumeText: string, document: RequirementsDocument): Promise<MatchResult>;
}

/**
 * The fields of a requirement the model may see. Descriptions are JD text,
 * and showing them invites the model to quote the JD back as evidence.
 */
export function requirementsForPrompt(requirements: readonly Requirement[]): Array<Pick<Requirement, 'id' | 'requirement_key' | 'name' | 'aliases'>> {
    return requirements.map(requirement => ({
        id: requirement.id,
        requirement_key: requirement.requirement_key,
        name: requirement.name,
        aliases: requirement.aliases
    }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEvidenceItem(raw: unknown): EvidenceItem | null {
    if (typeof raw === 'string') {
        return { quote: raw };
    }
    if (!isRecord(raw)) {
        return null;
    }

    const item: EvidenceItem = {
        quote: typeof raw.quote === 'string' ? raw.quote : ''
    };
    if (typeof raw.resume_section === 'string') {
        item.resume_section = raw.resume_section;
    }
    if (typeof raw.years_experience === 'number' && Number.isFinite(raw.years_experience)) {
        item.years_experience = raw.years_experience;
    } else if (raw.years_experience === null) {
        item.years_experience = null;
    }
    return item;
}

function toEvidenceList(raw: unknown): EvidenceItem[] {
    if (!Array.isArray(raw)) {
        return [];
    }
    return raw
        .map(toEvidenceItem)
        .filter((item): item is EvidenceItem => item !== null);
}

/**
 * Coerce one raw model entry and pin it to the canonical requirement,
 * looked up by id first and requirement_key second. Confidence values are
 * dropped: `matched` is the only verdict downstream stages read.
 */
export function reconcileMatch(
    raw: RawMatch,
    byId: ReadonlyMap<string, Requirement>,
    byKey: ReadonlyMap<string, Requirement>
): Match {
    const rawId = typeof raw.requirement_id === 'string' ? raw.requirement_id.trim() : '';
    const rawKey = typeof raw.requirement_key === 'string' ? raw.requirement_key.trim() : '';
    const canonical = byId.get(rawId) ?? byKey.get(rawKey);

    const verdict = {
        matched: raw.matched === true,
        evidence: toEvidenceList(raw.evidence),
        notes: typeof raw.notes === 'string' ? raw.notes : '',
        invalid_quote: false
    };

    if (canonical) {
        return {
            requirement_id: canonical.id,
            requirement_key: canonical.requirement_key,
            ...verdict
        };
    }

    // Unreconciled entries pass through under the identifiers the model gave
    return {
        requirement_id: rawId,
        ...(rawKey ? { requirement_key: rawKey } : {}),
        ...verdict
    };
}

/**
 * Evidence Matcher
 *
 * Maps résumé content onto a frozen requirement list with one model call
 * (plus one retry). The evidence map it returns has already been through
 * quote validation.
 */
export class EvidenceMatcher implements IEvidenceMatcher {
    constructor(
        private openai: IOpenAIService,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private config: PipelineConfig,
        private promptTemplate: string = loadPrompt('match_evidence'),
        private newRunId: () => string = () => crypto.randomUUID().slice(0, 8)
    ) { }

    /**
     * Factory method for production use
     */
    static create(openai: IOpenAIService, config: PipelineConfig): EvidenceMatcher {
        return new EvidenceMatcher(openai, RetryUtil, logger, config);
    }

    async match(resumeText: string, document: RequirementsDocument): Promise<MatchResult> {
        const requirements = document.requirements;
        const prompt = renderPrompt(this.promptTemplate, {
            requirements_json: JSON.stringify(requirementsForPrompt(requirements)),
            resume_text: resumeText
        });
        const promptHash = hashText(prompt);
        const resumeHash = hashText(resumeText);

        this.logger.info({
            jdHash: hashPrefix(document.jd_hash),
            resumeHash: hashPrefix(resumeHash),
            requirementsCount: requirements.length,
            model: this.config.matchModel
        }, 'Matching résumé against frozen requirements');

        const outcome = await this.retryUtil.attempt(
            async () => {
                const raw = await this.openai.generateJsonCompletion(
                    [{ role: 'user', content: prompt }],
                    {
                        model: this.config.matchModel,
                        temperature: this.config.temperature,
                        topP: this.config.topP
                    }
                );
                return parseModelJson(raw, matchPayloadSchema);
            },
            {
                maxAttempts: 2,
                baseDelay: this.config.retryDelayMs,
                operationName: 'Evidence matching'
            }
        );

        if (!outcome.ok) {
            throw new GenerationFailedError('match', outcome.attempts, outcome.error.message);
        }

        const byId = new Map(requirements.map(requirement => [requirement.id, requirement] as const));
        const byKey = new Map(requirements.map(requirement => [requirement.requirement_key, requirement] as const));
        const matches = outcome.value.matches.map(raw => reconcileMatch(raw, byId, byKey));

        const rawMap: EvidenceMap = {
            role_id: document.role_id,
            jd_hash: document.jd_hash,
            resume_hash: resumeHash,
            requirements_version: document.requirements_version,
            prompt_version: this.config.matchPromptVersion,
            model_id: this.config.matchModel,
            run_id: this.newRunId(),
            matches,
            meta: {
                matched_count_raw: 0,
                matched_count_validated: 0,
                invalid_quote_count: 0,
                evidence_prompt_includes_description: false
            }
        };

        const evidenceMap = validateEvidenceQuotes(resumeText, rawMap, this.config.minQuoteLength);

        this.logger.info({
            runId: evidenceMap.run_id,
            matchesCount: matches.length,
            matchedRaw: evidenceMap.meta.matched_count_raw,
            matchedValidated: evidenceMap.meta.matched_count_validated,
            invalidQuotes: evidenceMap.meta.invalid_quote_count,
            attempts: outcome.attempts
        }, 'Evidence matched and quotes validated');

        return {
            evidenceMap,
            audit: {
                prompt_version: this.config.matchPromptVersion,
                prompt_hash: promptHash,
                model_id: this.config.matchModel,
                model_params: {
                    temperature: this.config.temperature,
                    top_p: this.config.topP
                },
                attempts: outcome.attempts
            }
        };
    }
}
