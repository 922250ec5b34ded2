import { Router, Request, Response } from "express";
import { z } from "zod";
import { getPipelineConfig } from "../config/pipeline-config";
import { getMatchPipeline } from "../pipeline/match-pipeline";
import { toErrorResponse } from "./error-response";

const router = Router();

// Validation schema for build request
const buildSchema = z.object({
    jd_text: z.string().trim().min(1, "jd_text is required"),
    role_id: z.string().trim().min(1).optional()
});

/**
 * POST /requirements/build
 *
 * Extract, normalize and freeze the requirements for a job description.
 * Must run before /analyze is called with the same JD text.
 *
 * Body: { jd_text: string, role_id?: string }
 * Returns: { jd_hash, role_id, num_requirements, artifact_path, requirements_source }
 */
router.post('/build', async (req: Request, res: Response) => {
    try {
        const { jd_text, role_id } = buildSchema.parse(req.body);
        const pipeline = getMatchPipeline(getPipelineConfig());

        const result = await pipeline.buildRequirements(jd_text, role_id);
        res.json(result);

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        res.status(status).json(body);
    }
});

export { router as requirementsRoutes };
