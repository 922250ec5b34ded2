import * as path from 'path';
import pdf from 'pdf-parse';
import { logger, ILogger } from '../config/logger';
import { UnsupportedFileTypeError } from '../errors/pipeline-errors';

export interface IPDFParser {
    (buffer: Buffer): Promise<{ text: string }>;
}

export interface IDocumentProcessorService {
    extractText(buffer: Buffer, filename: string): Promise<string>;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt'] as const;

/**
 * Document Processor Service with Dependency Injection
 *
 * Text extraction collaborator for uploaded résumés and job descriptions.
 * PDFs go through pdf-parse, plain-text files are decoded as UTF-8.
 * Scanned (image-only) PDFs yield little or no text; that is reported as
 * an error rather than passed on as an empty résumé.
 */
export class DocumentProcessorService implements IDocumentProcessorService {
    constructor(
        private logger: ILogger,
        private pdfParser: IPDFParser = pdf
    ) { }

    /**
     * Factory method for production use
     */
    static create(): DocumentProcessorService {
        return new DocumentProcessorService(logger, pdf);
    }

    static isSupported(filename: string): boolean {
        const extension = path.extname(filename).toLowerCase();
        return SUPPORTED_EXTENSIONS.some(supported => supported === extension);
    }

    static unsupportedFileError(filename: string): UnsupportedFileTypeError {
        return new UnsupportedFileTypeError(filename, path.extname(filename).toLowerCase());
    }

    async extractText(buffer: Buffer, filename: string): Promise<string> {
        const extension = path.extname(filename).toLowerCase();

        if (!DocumentProcessorService.isSupported(filename)) {
            throw DocumentProcessorService.unsupportedFileError(filename);
        }

        const text = extension === '.pdf'
            ? await this.parsePDF(buffer)
            : buffer.toString('utf-8').trim();

        if (text.length === 0) {
            throw new Error('Document contains no extractable text');
        }

        this.logger.info({
            filename,
            extension,
            characters: text.length
        }, 'Document text extracted');

        return text;
    }

    private async parsePDF(buffer: Buffer): Promise<string> {
        try {
            const pdfData = await this.pdfParser(buffer);
            return pdfData.text.trim();
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error({ error: reason }, 'Failed to parse PDF');
            throw new Error(`PDF parsing failed: ${reason}`);
        }
    }
}

// Singleton instance
let documentProcessorService: DocumentProcessorService | null = null;

export function getDocumentProcessorService(): DocumentProcessorService {
    if (!documentProcessorService) {
        documentProcessorService = DocumentProcessorService.create();
    }
    return documentProcessorService;
}
