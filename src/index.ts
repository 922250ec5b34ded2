// Load environment variables before any module reads them
import "dotenv/config";
import express, { NextFunction, Request, Response } from "express";
import { requirementsRoutes } from "./routes/requirements";
import { analyzeRoutes } from "./routes/analyze";
import { uploadRoutes } from "./routes/upload";
import { resumeRoutes } from "./routes/resume";
import { toErrorResponse } from "./routes/error-response";
import { logger, errorFields } from "./config/logger";
import { getPipelineConfig } from "./config/pipeline-config";
import { getMatchPipeline } from "./pipeline/match-pipeline";

const app = express();

// Middleware
app.use(express.json({ limit: '2mb' }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/requirements", requirementsRoutes);
app.use("/analyze", analyzeRoutes);
app.use("/upload", uploadRoutes);
app.use("/resume", resumeRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Frozen-requirements résumé matching API",
        version: "1.0.0",
        description: "Deterministic JD requirement extraction, evidence matching and scoring",
        endpoints: {
            "Requirements": {
                "POST /requirements/build": "Extract and freeze requirements for a job description"
            },
            "Evaluation": {
                "POST /analyze": "Score a résumé against frozen requirements",
                "POST /analyze/repeatability": "Evaluate the same pair several times and report variance"
            },
            "Tailoring": {
                "POST /resume/tailor": "Rewrite a résumé toward a job description",
                "POST /resume/refine": "Rewrite a résumé following refinement instructions"
            },
            "File Management": {
                "POST /upload": "Extract text from a PDF or TXT file"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        }
    });
});

// Errors raised by middleware (multer file filter, JSON body parser)
app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        next(error);
        return;
    }
    logger.warn({ path: req.path, ...errorFields(error) }, 'Request rejected by middleware');
    const { status, body } = toErrorResponse(error);
    res.status(status).json(body);
});

function startServer(): void {
    try {
        const pipelineConfig = getPipelineConfig();

        if (!pipelineConfig.apiKey) {
            logger.warn({}, "No LLM API key configured; generation endpoints will answer 400");
        }

        // Fail fast on missing prompt templates
        getMatchPipeline(pipelineConfig);

        app.listen(pipelineConfig.port, () => {
            logger.info({
                port: pipelineConfig.port,
                artifactsDir: pipelineConfig.artifactsDir,
                extractModel: pipelineConfig.extractModel,
                matchModel: pipelineConfig.matchModel
            }, `Server running at http://localhost:${pipelineConfig.port}`);
        });
    } catch (error: unknown) {
        logger.error(errorFields(error), "Failed to start server");
        process.exit(1);
    }
}

startServer();
