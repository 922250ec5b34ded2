import { logger, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';
import { GenerationFailedError } from '../errors/pipeline-errors';
import { extractionPayloadSchema, parseModelJson } from '../schemas/model-payload.schema';
import { IOpenAIService } from '../services/openai.service';
import { GenerationAudit, RequirementsDocument } from '../types/requirements';
import { hashPrefix, hashText, isoNow } from '../utils/hash.util';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';
import { normalizeRequirements } from './normalizer';
import { loadPrompt, renderPrompt } from './prompt-templates';

export interface ExtractionResult {
    document: RequirementsDocument;
    audit: GenerationAudit;
}

export interface IRequirementsExtractor {
    extract(jdText: string, roleId?: string): Promise<ExtractionResult>;
}

export function defaultRoleId(jdHash: string): string {
    return `role_${jdHash.slice(0, 12)}`;
}

/**
 * Requirements Extractor
 *
 * One model call (plus one retry) turns JD text into raw requirements,
 * which the normalizer canonicalizes. The audit record travels next to the
 * document so that persisting the document never persists audit fields.
 */
export class RequirementsExtractor implements IRequirementsExtractor {
    constructor(
        private openai: IOpenAIService,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private config: PipelineConfig,
        private promptTemplate: string = loadPrompt('extract_requirements'),
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(openai: IOpenAIService, config: PipelineConfig): RequirementsExtractor {
        return new RequirementsExtractor(openai, RetryUtil, logger, config);
    }

    async extract(jdText: string, roleId?: string): Promise<ExtractionResult> {
        const prompt = renderPrompt(this.promptTemplate, { jd_text: jdText });
        const promptHash = hashText(prompt);
        const jdHash = hashText(jdText);

        this.logger.info({
            jdHash: hashPrefix(jdHash),
            promptVersion: this.config.extractPromptVersion,
            model: this.config.extractModel
        }, 'Extracting requirements from JD');

        const outcome = await this.retryUtil.attempt(
            async () => {
                const raw = await this.openai.generateJsonCompletion(
                    [{ role: 'user', content: prompt }],
                    {
                        model: this.config.extractModel,
                        temperature: this.config.temperature,
                        topP: this.config.topP
                    }
                );
                return parseModelJson(raw, extractionPayloadSchema);
            },
            {
                maxAttempts: 2,
                baseDelay: this.config.retryDelayMs,
                operationName: 'Requirements extraction'
            }
        );

        if (!outcome.ok) {
            throw new GenerationFailedError('extract', outcome.attempts, outcome.error.message);
        }

        const payload = outcome.value;
        const requirements = normalizeRequirements(payload.requirements, {
            jaccardThreshold: this.config.jaccardThreshold
        });

        const document: RequirementsDocument = {
            role_id: roleId || defaultRoleId(jdHash),
            jd_hash: jdHash,
            requirements_version: this.config.requirementsVersion,
            created_at: isoNow(this.clock()),
            role_title: payload.role_title,
            requirements
        };

        this.logger.info({
            jdHash: hashPrefix(jdHash),
            roleId: document.role_id,
            rawCount: payload.requirements.length,
            normalizedCount: requirements.length,
            attempts: outcome.attempts
        }, 'Requirements extracted and normalized');

        return {
            document,
            audit: {
                prompt_version: this.config.extractPromptVersion,
                prompt_hash: promptHash,
                model_id: this.config.extractModel,
                model_params: {
                    temperature: this.config.temperature,
                    top_p: this.config.topP
                },
                attempts: outcome.attempts
            }
        };
    }
}
