import fs from 'fs/promises';
import path from 'path';

import { DEFAULT_TIMEOUT_MS, LEGACY_DEFAULT_BASE_URL, LEGACY_DEFAULT_PLATFORM_URL } from '../config.js';
import { legacyHeaders } from '../credentials.js';
import { UnexpectedResponseError, describeError } from '../errors.js';
import { assertReadableFile } from '../files.js';
import { HttpTransport } from '../http.js';
import { createLogger, type Logger } from '../logger.js';
import { parseInput, requireId, segment } from '../validation.js';
import {
    AnalysisStatusSchema,
    CreatedRecordSchema,
    LegacyGenomeReferenceSchema,
    LegacyGermlineCallingSchema,
    LegacyRecordSchema,
    LegacySampleSourceSchema,
    LegacySequencingTypeSchema,
    ResultFilesSchema,
    UploadTicketSchema,
    type AnalysisStatus,
    type LegacyGenomeReference,
    type LegacyRecord,
    type LegacySampleInput,
    type LegacySequencingInput,
    type SequencingScope,
    type UploadTicket,
} from './types.js';

export interface LegacyClientOptions {
    user: string;
    token: string;
    baseUrl?: string;
    /** Web platform used to build browse links. */
    platformUrl?: string;
    timeoutMs?: number;
    logger?: Logger;
}

export interface StartAnalysisInput {
    fileIds: string[];
    reference: LegacyGenomeReference;
    title: string;
}

export interface LegacyAnalysisInput {
    files: string[];
    reference: LegacyGenomeReference;
    title: string;
}

/** Last path segment of a download URL, decoded, without its query string. Never a path. */
export function fileNameFromUrl(url: string): string {
    const withoutQuery = url.split(/[?#]/)[0] ?? '';
    const name = withoutQuery.split('/').pop() ?? '';
    let decoded: string;
    try {
        decoded = decodeURIComponent(name);
    } catch (error) {
        throw new UnexpectedResponseError(`Malformed result URL: ${url} (${describeError(error)})`, url);
    }
    if (decoded === '' || decoded === '.' || decoded === '..' || /[/\\]/.test(decoded)) {
        throw new UnexpectedResponseError(`Cannot derive a file name from result URL: ${url}`, url);
    }
    return decoded;
}

/**
 * Client for the first-generation API. Records are addressed by numeric or
 * string ids nested under project/patient/sample/sequencing.
 */
export class LegacyClinicsClient {
    private readonly transport: HttpTransport;
    private readonly log: Logger;
    private readonly platformUrl: string;

    constructor(options: LegacyClientOptions) {
        const user = requireId(options.user, 'user');
        const token = requireId(options.token, 'token');
        this.log = options.logger ?? createLogger('cgi-clinics-legacy');
        this.platformUrl = (options.platformUrl ?? LEGACY_DEFAULT_PLATFORM_URL).replace(/\/+$/, '');
        this.transport = new HttpTransport({
            baseUrl: options.baseUrl ?? LEGACY_DEFAULT_BASE_URL,
            headers: legacyHeaders({ user, token }),
            timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            logger: this.log,
        });
    }

    private projectPath(projectId: string): string {
        return `/projects/${segment(requireId(projectId, 'projectId'))}`;
    }

    private patientPath(projectId: string, patientId: string): string {
        return `${this.projectPath(projectId)}/patients/${segment(requireId(patientId, 'patientId'))}`;
    }

    private samplePath(projectId: string, patientId: string, sampleId: string): string {
        return `${this.patientPath(projectId, patientId)}/samples/${segment(requireId(sampleId, 'sampleId'))}`;
    }

    private sequencingPath(scope: SequencingScope): string {
        const sample = this.samplePath(scope.projectId, scope.patientId, scope.sampleId);
        return `${sample}/sequencings/${segment(requireId(scope.sequencingId, 'sequencingId'))}`;
    }

    // --- Lookups ---

    async getProject(projectId: string): Promise<LegacyRecord> {
        const projectPath = this.projectPath(projectId);
        this.log.info(`Checking project ${projectId}`);
        return this.transport.json(LegacyRecordSchema, {
            method: 'GET',
            path: projectPath,
            action: `Checking project ${projectId}`,
        });
    }

    async getPatient(projectId: string, patientId: string): Promise<LegacyRecord> {
        const patientPath = this.patientPath(projectId, patientId);
        this.log.info(`Fetching patient ${patientId}`);
        return this.transport.json(LegacyRecordSchema, {
            method: 'GET',
            path: patientPath,
            action: `Fetching patient ${patientId}`,
        });
    }

    // --- Record creation ---

    async createPatient(projectId: string, key: string): Promise<string> {
        const collection = `${this.projectPath(projectId)}/patients`;
        requireId(key, 'patient key');
        this.log.info(`Creating patient ${key}`);
        const created = await this.transport.json(CreatedRecordSchema, {
            method: 'POST',
            path: collection,
            action: `Creating patient ${key}`,
            json: { key },
        });
        this.log.info(`Patient ${key} created with ID ${created.id}`);
        return created.id;
    }

    async deletePatient(projectId: string, patientId: string): Promise<void> {
        const patientPath = this.patientPath(projectId, patientId);
        this.log.info(`Deleting patient ${patientId}`);
        await this.transport.empty({
            method: 'DELETE',
            path: patientPath,
            action: `Deleting patient ${patientId}`,
        });
        this.log.info(`Patient ${patientId} deleted`);
    }

    async createSample(projectId: string, patientId: string, input: LegacySampleInput): Promise<string> {
        const collection = `${this.patientPath(projectId, patientId)}/samples`;
        requireId(input.key, 'sample key');
        const source = parseInput(LegacySampleSourceSchema, input.source, 'sample source');
        this.log.info(`Creating sample ${input.key}`);
        const created = await this.transport.json(CreatedRecordSchema, {
            method: 'POST',
            path: collection,
            action: `Creating sample ${input.key}`,
            json: { key: input.key, source, cancertype: input.cancerType },
        });
        this.log.info(`Sample ${input.key} created with ID ${created.id}`);
        return created.id;
    }

    async createSequencing(
        projectId: string,
        patientId: string,
        sampleId: string,
        input: LegacySequencingInput
    ): Promise<string> {
        // Creation uses the singular `sequencing`; everything below it the plural.
        const collection = `${this.samplePath(projectId, patientId, sampleId)}/sequencing`;
        requireId(input.key, 'sequencing key');
        const type = parseInput(LegacySequencingTypeSchema, input.type, 'sequencing type');
        const callingGermline = parseInput(LegacyGermlineCallingSchema, input.callingGermline, 'germline calling');
        this.log.info(`Creating sequencing ${input.key}`);
        const created = await this.transport.json(CreatedRecordSchema, {
            method: 'POST',
            path: collection,
            action: `Creating sequencing ${input.key}`,
            json: { key: input.key, type, mut_call_germline: callingGermline },
        });
        this.log.info(`Sequencing ${input.key} created with ID ${created.id}`);
        return created.id;
    }

    // --- Uploads and analyses ---

    /** `extension` may be given with or without its leading dot. */
    async requestUpload(scope: SequencingScope, extension: string): Promise<UploadTicket> {
        const uploadPath = `${this.sequencingPath(scope)}/upload`;
        const ext = extension.replace(/^\./, '');
        const ticket = await this.transport.json(UploadTicketSchema, {
            method: 'GET',
            path: uploadPath,
            action: 'Creating upload request',
            query: { extension: ext },
        });
        return { fileId: ticket.file_id, uploadUrl: ticket.upload_url };
    }

    /** PUTs the raw file to the signed URL. The URL carries its own authorization. */
    async uploadFile(uploadUrl: string, filePath: string): Promise<void> {
        await assertReadableFile(filePath);
        const bytes = await fs.readFile(filePath);
        this.log.info(`Uploading ${filePath}`);
        await this.transport.putBytes(this.transport.resolve(uploadUrl), bytes, `Uploading file ${filePath}`);
    }

    async startAnalysis(scope: SequencingScope, input: StartAnalysisInput): Promise<string> {
        const analysisPath = `${this.sequencingPath(scope)}/analysis`;
        const reference = parseInput(LegacyGenomeReferenceSchema, input.reference, 'genome reference');
        const created = await this.transport.json(CreatedRecordSchema, {
            method: 'POST',
            path: analysisPath,
            action: 'Creating analysis request',
            json: { title: input.title, reference, file_ids: input.fileIds },
        });
        this.log.info(`Analysis created with ID ${created.id}`);
        return created.id;
    }

    /** Uploads each file in turn, then starts one analysis over all of them. */
    async createAnalysis(scope: SequencingScope, input: LegacyAnalysisInput): Promise<string> {
        for (const file of input.files) {
            await assertReadableFile(file);
        }
        const fileIds: string[] = [];
        for (const file of input.files) {
            const ticket = await this.requestUpload(scope, path.extname(file));
            await this.uploadFile(ticket.uploadUrl, file);
            fileIds.push(ticket.fileId);
        }
        return this.startAnalysis(scope, { fileIds, reference: input.reference, title: input.title });
    }

    async getAnalysisStatus(projectId: string, analysisId: string): Promise<AnalysisStatus> {
        const analysisPath = `${this.projectPath(projectId)}/analysis/${segment(requireId(analysisId, 'analysisId'))}`;
        const { status } = await this.transport.json(AnalysisStatusSchema, {
            method: 'GET',
            path: analysisPath,
            action: 'Checking analysis status',
        });
        return { done: status !== 'waiting', status };
    }

    /** Downloads every result file into `outputDir`; resolves with the written paths. */
    async downloadAnalysis(
        scope: Omit<SequencingScope, 'patientId'>,
        analysisId: string,
        outputDir: string
    ): Promise<string[]> {
        const { projectId, sampleId, sequencingId } = scope;
        const resultsPath =
            `${this.projectPath(projectId)}/samples/${segment(requireId(sampleId, 'sampleId'))}` +
            `/sequencing/${segment(requireId(sequencingId, 'sequencingId'))}` +
            `/analysis/${segment(requireId(analysisId, 'analysisId'))}/results`;
        const { files } = await this.transport.json(ResultFilesSchema, {
            method: 'POST',
            path: resultsPath,
            action: 'Fetching analysis results',
            json: {
                project_id: projectId,
                sample_id: sampleId,
                sequencing_id: sequencingId,
                analysis_id: analysisId,
            },
        });

        const written: string[] = [];
        for (const file of files) {
            const target = path.join(outputDir, fileNameFromUrl(file.url));
            this.log.info(`Downloading ${file.name} to ${outputDir}`);
            await this.transport.fetchToFile(this.transport.resolve(file.url), target, `Downloading ${file.name}`);
            written.push(target);
        }
        return written;
    }

    analysisUrl(projectId: string, analysisId: string): string {
        const query = new URLSearchParams({ gid: projectId, aid: analysisId });
        return `${this.platformUrl}/analysis?${query.toString()}`;
    }
}
