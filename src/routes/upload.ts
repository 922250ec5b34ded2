import { Router, Request, Response } from "express";
import multer from "multer";
import { logger } from "../config/logger";
import { DocumentProcessorService, getDocumentProcessorService } from "../services/document-processor.service";
import { toErrorResponse } from "./error-response";

const router = Router();

export const uploadFileFilter: NonNullable<multer.Options['fileFilter']> = (req, file, cb) => {
    if (DocumentProcessorService.isSupported(file.originalname)) {
        cb(null, true);
    } else {
        cb(DocumentProcessorService.unsupportedFileError(file.originalname));
    }
};

// Files stay in memory: only their text is needed
const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: 10 * 1024 * 1024, // 10MB limit
    },
    fileFilter: uploadFileFilter
});

/**
 * POST /upload
 *
 * Extract text from an uploaded résumé or job description (PDF or TXT).
 * Returns: { text: string, filename: string }
 */
router.post('/', upload.single('file'), async (req: Request, res: Response) => {
    try {
        const file = req.file;

        if (!file) {
            return res.status(400).json({
                error: 'No file provided'
            });
        }

        const text = await getDocumentProcessorService().extractText(file.buffer, file.originalname);

        logger.info({
            filename: file.originalname,
            size: file.size,
            characters: text.length
        }, 'File uploaded and text extracted');

        return res.json({
            text,
            filename: file.originalname
        });

    } catch (error: unknown) {
        const { status, body } = toErrorResponse(error);
        return res.status(status).json(body);
    }
});

export { router as uploadRoutes };
