import { Router, Request, Response } from "express";
import { z } from "zod";
import { getPipelineConfig } from "../config/pipeline-config";
import { getMatchPipeline, MAX_REPEATABILITY_RUNS } from "../pipeline/match-pipeline";
import { toErrorResponse } from "./error-response";

const router = Router();

// Validation schema for analyze request
const analyzeSchema = z.object({
    jd_text: z.string().trim().min(1, "Job description text is required"),
    resume_text: z.string().trim().min(1, "Résumé text is required")
});

/**
 * POST /analyze
 *
 * Score a résumé against the frozen requirements of a job description.
 * Answers 409 with code REQUIREMENTS_MISSING when the JD was never built;
 * requirements are not extracted implicitly.
 *
 * Body: { jd_text: string, resume_text: string }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const { jd_text, resume_text } = analyzeSchema.parse(req.body);
        const pipeline = getMatchPipeline(getPipelineConfig());

        const result = await pipeline.evaluate(jd_text, resume_text);
        res.json(result);

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        res.status(status).json(body);
    }
});

const repeatabilitySchema = analyzeSchema.extend({
    runs: z.number().int().min(1).max(MAX_REPEATABILITY_RUNS).default(3)
});

/**
 * POST /analyze/repeatability
 *
 * Evaluate the same pair several times against the frozen requirements and
 * report score range, per-run variances and provenance.
 *
 * Body: { jd_text: string, resume_text: string, runs?: number }
 */
router.post('/repeatability', async (req: Request, res: Response) => {
    try {
        const { jd_text, resume_text, runs } = repeatabilitySchema.parse(req.body);
        const pipeline = getMatchPipeline(getPipelineConfig());

        const report = await pipeline.checkRepeatability(jd_text, resume_text, runs);
        res.json(report);

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        res.status(status).json(body);
    }
});

export { router as analyzeRoutes };
