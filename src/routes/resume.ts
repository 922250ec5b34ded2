import { Router, Request, Response } from "express";
import { z } from "zod";
import { getPipelineConfig } from "../config/pipeline-config";
import { getResumeTailorService } from "../services/resume-tailor.service";
import { toErrorResponse } from "./error-response";

const router = Router();

const tailorSchema = z.object({
    resume_text: z.string().trim().min(1, "Résumé text is required"),
    jd_text: z.string().trim().min(1, "Job description text is required")
});

const refineSchema = tailorSchema.extend({
    refine_instructions: z.string().trim().min(1, "Refinement instructions are required")
});

/**
 * POST /resume/tailor
 *
 * Rewrite a résumé toward a job description without inventing experience.
 *
 * Body: { resume_text: string, jd_text: string }
 * Returns: { tailored_text, prompt_version, model_id }
 */
router.post('/tailor', async (req: Request, res: Response) => {
    try {
        const { resume_text, jd_text } = tailorSchema.parse(req.body);

        const result = await getResumeTailorService(getPipelineConfig()).tailor(resume_text, jd_text);
        res.json(result);

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        res.status(status).json(body);
    }
});

/**
 * POST /resume/refine
 *
 * Body: { resume_text: string, jd_text: string, refine_instructions: string }
 * Returns: { tailored_text, prompt_version, model_id }
 */
router.post('/refine', async (req: Request, res: Response) => {
    try {
        const { resume_text, jd_text, refine_instructions } = refineSchema.parse(req.body);

        const result = await getResumeTailorService(getPipelineConfig())
            .refine(resume_text, jd_text, refine_instructions);
        res.json(result);

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        res.status(status).json(body);
    }
});

export { router as resumeRoutes };
