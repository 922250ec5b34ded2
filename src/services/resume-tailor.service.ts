import { logger, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';
import { ApiKeyMissingError, GenerationFailedError } from '../errors/pipeline-errors';
import { loadPrompt, renderPrompt } from '../pipeline/prompt-templates';
import { parseModelJson, tailoredResumePayloadSchema } from '../schemas/model-payload.schema';
import { hashPrefix, hashText } from '../utils/hash.util';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';
import { ChatMessage, getOpenAIService, IOpenAIService } from './openai.service';

export interface TailoredResume {
    tailored_text: string;
    prompt_version: string;
    model_id: string;
}

export interface ResumeTailorTemplates {
    tailor: string;
    refine: string;
}

export interface IResumeTailorService {
    tailor(resumeText: string, jdText: string): Promise<TailoredResume>;
    refine(resumeText: string, jdText: string, instructions: string): Promise<TailoredResume>;
}

export function tailorUserMessage(resumeText: string, jdText: string): string {
    return `Original Resume: ${resumeText}\n\nTarget JD: ${jdText}`;
}

/**
 * Resume Tailor Service with Dependency Injection
 *
 * Rewrites a résumé toward a job description, optionally following user
 * refinement instructions. Output is free text for the candidate to edit;
 * it never feeds the frozen requirements or scoring.
 */
export class ResumeTailorService implements IResumeTailorService {
    constructor(
        private openai: IOpenAIService,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private config: PipelineConfig,
        private templates: ResumeTailorTemplates = {
            tailor: loadPrompt('tailor_resume'),
            refine: loadPrompt('refine_resume')
        }
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: PipelineConfig): ResumeTailorService {
        return new ResumeTailorService(getOpenAIService(config), RetryUtil, logger, config);
    }

    async tailor(resumeText: string, jdText: string): Promise<TailoredResume> {
        return this.generate('tailor', this.templates.tailor, this.config.tailorPromptVersion, resumeText, jdText);
    }

    async refine(resumeText: string, jdText: string, instructions: string): Promise<TailoredResume> {
        const systemPrompt = renderPrompt(this.templates.refine, { refine_instructions: instructions });
        return this.generate('refine', systemPrompt, this.config.refinePromptVersion, resumeText, jdText);
    }

    private async generate(
        stage: 'tailor' | 'refine',
        systemPrompt: string,
        promptVersion: string,
        resumeText: string,
        jdText: string
    ): Promise<TailoredResume> {
        if (!this.config.apiKey) {
            throw new ApiKeyMissingError();
        }

        const messages: ChatMessage[] = [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: tailorUserMessage(resumeText, jdText) }
        ];

        this.logger.info({
            stage,
            resumeHash: hashPrefix(hashText(resumeText)),
            jdHash: hashPrefix(hashText(jdText)),
            promptVersion,
            model: this.config.tailorModel
        }, 'Tailoring résumé');

        const outcome = await this.retryUtil.attempt(
            async () => {
                const raw = await this.openai.generateJsonCompletion(messages, {
                    model: this.config.tailorModel,
                    temperature: this.config.temperature,
                    topP: this.config.topP
                });
                return parseModelJson(raw, tailoredResumePayloadSchema);
            },
            {
                maxAttempts: 2,
                baseDelay: this.config.retryDelayMs,
                operationName: `Résumé ${stage}`
            }
        );

        if (!outcome.ok) {
            this.logger.error({ stage, attempts: outcome.attempts, error: outcome.error.message }, 'Résumé tailoring failed');
            throw new GenerationFailedError(stage, outcome.attempts, outcome.error.message);
        }

        this.logger.info({
            stage,
            outputChars: outcome.value.tailored_text.length,
            attempts: outcome.attempts
        }, 'Résumé tailored');

        return {
            tailored_text: outcome.value.tailored_text,
            prompt_version: promptVersion,
            model_id: this.config.tailorModel
        };
    }
}

// Singleton instance
let resumeTailorService: ResumeTailorService | null = null;

export function getResumeTailorService(config: PipelineConfig): ResumeTailorService {
    if (!resumeTailorService) {
        resumeTailorService = ResumeTailorService.create(config);
    }
    return resumeTailorService;
}
