import * as crypto from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { logger, ILogger } from '../config/logger';
import { PipelineConfig } from '../config/pipeline-config';
import { RequirementsMissingError } from '../errors/pipeline-errors';
import { validateEvidenceMap, validateRequirementsDocument } from '../schemas/artifact.schema';
import { EvidenceMap, RunReport } from '../types/evidence';
import { RequirementsDocument } from '../types/requirements';
import { hashPrefix } from '../utils/hash.util';

const REQUIREMENTS_PREFIX = 'job_requirements.';
const REQUIREMENTS_SUFFIX = '.v1.json';

export interface LoadedRequirements {
    document: RequirementsDocument;
    path: string;
}

export interface IArtifactStore {
    saveRequirements(document: RequirementsDocument): Promise<string>;
    loadRequirements(roleId: string, jdHash: string): Promise<LoadedRequirements>;
    loadRequirementsByJdHash(jdHash: string): Promise<LoadedRequirements>;
    saveEvidenceMap(evidenceMap: EvidenceMap): Promise<string>;
    saveRunReport(report: RunReport): Promise<string>;
}

/**
 * Replace anything outside `[A-Za-z0-9_-]` with `_` so ids are safe in filenames.
 */
export function safeFilePart(value: string): string {
    return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

export function requirementsFileName(roleId: string, jdHash: string): string {
    return `${REQUIREMENTS_PREFIX}${safeFilePart(roleId)}.${safeFilePart(jdHash)}${REQUIREMENTS_SUFFIX}`;
}

export function evidenceFileName(evidenceMap: Pick<EvidenceMap, 'jd_hash' | 'resume_hash' | 'run_id'>): string {
    const jd = safeFilePart(hashPrefix(evidenceMap.jd_hash || 'unknown'));
    const resume = safeFilePart(hashPrefix(evidenceMap.resume_hash || 'unknown'));
    return `evidence_${jd}_${resume}_${safeFilePart(evidenceMap.run_id || 'unknown')}.json`;
}

export function runReportFileName(runId: string): string {
    return `run_report_${safeFilePart(runId)}.json`;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Artifact Store
 *
 * File-backed store for frozen requirements and write-only evidence/run
 * artifacts. Requirements are looked up by JD hash; a missing document is
 * an error for the caller to surface, never a cue to regenerate.
 * Writes replace the target file atomically, so concurrent writers of the
 * same key end with the last complete write.
 */
export class ArtifactStore implements IArtifactStore {
    constructor(
        private artifactsDir: string,
        private reportsDir: string,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: PipelineConfig): ArtifactStore {
        return new ArtifactStore(config.artifactsDir, config.reportsDir, logger);
    }

    async saveRequirements(document: RequirementsDocument): Promise<string> {
        const valid = validateRequirementsDocument(document);
        const target = path.join(this.artifactsDir, requirementsFileName(valid.role_id, valid.jd_hash));

        await this.writeJsonAtomic(target, valid);

        this.logger.info({
            roleId: valid.role_id,
            jdHash: hashPrefix(valid.jd_hash),
            requirementsCount: valid.requirements.length,
            path: target
        }, 'Requirements artifact saved');

        return target;
    }

    async loadRequirements(roleId: string, jdHash: string): Promise<LoadedRequirements> {
        const target = path.join(this.artifactsDir, requirementsFileName(roleId, jdHash));

        try {
            return { document: await this.readRequirements(target), path: target };
        } catch (error: unknown) {
            if (isNotFound(error)) {
                throw new RequirementsMissingError(jdHash, roleId);
            }
            throw error;
        }
    }

    async loadRequirementsByJdHash(jdHash: string): Promise<LoadedRequirements> {
        const suffix = `.${safeFilePart(jdHash)}${REQUIREMENTS_SUFFIX}`;
        let entries: string[];

        try {
            entries = await fs.readdir(this.artifactsDir);
        } catch (error: unknown) {
            if (isNotFound(error)) {
                throw new RequirementsMissingError(jdHash);
            }
            throw error;
        }

        const candidates = entries
            .filter(name => name.startsWith(REQUIREMENTS_PREFIX) && name.endsWith(suffix))
            .sort();

        if (candidates.length === 0) {
            throw new RequirementsMissingError(jdHash);
        }

        const target = path.join(this.artifactsDir, candidates[0]);
        return { document: await this.readRequirements(target), path: target };
    }

    async saveEvidenceMap(evidenceMap: EvidenceMap): Promise<string> {
        const valid = validateEvidenceMap(evidenceMap);
        const target = path.join(this.artifactsDir, evidenceFileName(valid));

        await this.writeJsonAtomic(target, valid);

        this.logger.info({
            runId: valid.run_id,
            jdHash: hashPrefix(valid.jd_hash),
            resumeHash: hashPrefix(valid.resume_hash),
            path: target
        }, 'Evidence artifact saved');

        return target;
    }

    async saveRunReport(report: RunReport): Promise<string> {
        const target = path.join(this.reportsDir, runReportFileName(report.run_id));
        await this.writeJsonAtomic(target, report);

        this.logger.info({ runId: report.run_id, path: target }, 'Run report saved');
        return target;
    }

    private async readRequirements(target: string): Promise<RequirementsDocument> {
        const content = await fs.readFile(target, 'utf-8');
        return validateRequirementsDocument(JSON.parse(content));
    }

    private async writeJsonAtomic(target: string, data: unknown): Promise<void> {
        await fs.mkdir(path.dirname(target), { recursive: true });
        const temporary = `${target}.${process.pid}.${crypto.randomUUID()}.tmp`;

        try {
            await fs.writeFile(temporary, JSON.stringify(data, null, 2), 'utf-8');
            await fs.rename(temporary, target);
        } catch (error: unknown) {
            await fs.rm(temporary, { force: true });
            throw error;
        }
    }
}
