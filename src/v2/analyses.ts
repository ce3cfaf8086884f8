import _ from 'lodash';

import { ValidationError } from '../errors.js';
import { assertReadableFile } from '../files.js';
import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { parseInput, requireId, segment } from '../validation.js';
import {
    AnalysisInputSchema,
    AnalysisPageSchema,
    AnalysisSchema,
    DirectAnalysisInputSchema,
    ResultKindSchema,
    type Analysis,
    type AnalysisInput,
    type AnalysisPage,
    type DirectAnalysisInput,
    type Pagination,
    type ResultKind,
} from './types.js';
import type { UploadsApi } from './uploads.js';

/** The input source of an analysis: uploaded file uuids, or inline text. */
type AnalysisSource = { inputFiles: string[] } | { inputText: string; format: string };

/** Enforces the files-xor-text rule; nothing goes over the wire if this throws. */
export function checkAnalysisSource(input: Pick<AnalysisInput, 'inputFiles' | 'inputText' | 'inputFormat'>): void {
    const hasFiles = !_.isNil(input.inputFiles);
    const hasText = !_.isNil(input.inputText);
    if (!hasFiles && !hasText) {
        throw new ValidationError('Either inputFiles or inputText must be provided');
    }
    if (hasFiles && hasText) {
        throw new ValidationError('Cannot use both inputFiles and inputText together');
    }
    if (hasText && _.isNil(input.inputFormat)) {
        throw new ValidationError('Format must be specified when using inputText');
    }
}

export class AnalysesApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly uploads: UploadsApi,
        private readonly log: Logger
    ) {}

    private base(projectUuid: string): string {
        return `/project/${segment(requireId(projectUuid, 'projectUuid'))}`;
    }

    private item(projectUuid: string, analysisUuid: string): string {
        return `${this.base(projectUuid)}/analysis/${segment(requireId(analysisUuid, 'analysisUuid'))}`;
    }

    async listAll(projectUuid: string): Promise<AnalysisPage> {
        const path = `${this.base(projectUuid)}/analysis/full`;
        this.log.info(`Fetching all analyses for project: ${projectUuid}`);
        const analyses = await this.transport.json(AnalysisPageSchema, {
            method: 'GET',
            path,
            action: 'Failed to get analyses',
        });
        this.log.info('Analyses retrieved successfully');
        return analyses;
    }

    async list(projectUuid: string, { size = 10, page = 0 }: Pagination = {}): Promise<AnalysisPage> {
        const path = `${this.base(projectUuid)}/analysis/`;
        this.log.info({ size, page }, `Fetching analyses for project: ${projectUuid}`);
        const analyses = await this.transport.json(AnalysisPageSchema, {
            method: 'GET',
            path,
            action: 'Failed to get analyses',
            query: { size, page },
        });
        this.log.info('Analyses retrieved successfully');
        return analyses;
    }

    async get(projectUuid: string, analysisUuid: string): Promise<Analysis> {
        const path = this.item(projectUuid, analysisUuid);
        this.log.info(`Fetching analysis: ${analysisUuid}`);
        const analysis = await this.transport.json(AnalysisSchema, {
            method: 'GET',
            path,
            action: 'Failed to get analysis',
        });
        this.log.info(`Analysis retrieved successfully: ${analysisUuid}`);
        return analysis;
    }

    /** Saves one result document of a finished analysis to `outputFile`. */
    async downloadResult(projectUuid: string, analysisUuid: string, kind: ResultKind, outputFile: string): Promise<void> {
        const resultKind = parseInput(ResultKindSchema, kind, 'result kind');
        const path = `${this.item(projectUuid, analysisUuid)}/result/${resultKind}`;
        this.log.info(`Fetching analysis ${analysisUuid} ${resultKind}`);
        await this.transport.download(
            { method: 'GET', path, action: `Failed to get analysis ${resultKind}` },
            outputFile
        );
        this.log.info(`Analysis ${resultKind} saved to ${outputFile}`);
    }

    async create(projectUuid: string, input: AnalysisInput): Promise<Analysis> {
        checkAnalysisSource(input);
        const parsed = parseInput(AnalysisInputSchema, input, 'analysis');
        const path = `${this.base(projectUuid)}/analysis`;
        this.log.info(`Creating analysis for project: ${projectUuid}`);

        const source = await this.resolveSource(projectUuid, parsed);
        const analysis = await this.transport.json(AnalysisSchema, {
            method: 'POST',
            path,
            action: 'Failed to create analysis',
            json: { analysisId: parsed.analysisId, referenceGenome: parsed.referenceGenome, ...source },
        });
        this.log.info(`Analysis created successfully: ${parsed.analysisId}`);
        return analysis;
    }

    /**
     * Creates patient, sample, sequencing and analysis in one request, keyed by
     * the caller's own ids rather than uuids.
     */
    async createDirect(projectUuid: string, input: DirectAnalysisInput): Promise<Analysis> {
        checkAnalysisSource(input);
        const parsed = parseInput(DirectAnalysisInputSchema, input, 'direct analysis');
        const path = `${this.base(projectUuid)}/direct-analysis`;
        this.log.info(`Creating direct analysis for project: ${projectUuid}`);

        const source = await this.resolveSource(projectUuid, parsed);
        const analysis = await this.transport.json(AnalysisSchema, {
            method: 'POST',
            path,
            action: 'Failed to create direct analysis',
            json: {
                patientId: parsed.patientId,
                sampleId: parsed.sampleId,
                sequencingId: parsed.sequencingId,
                analysisId: parsed.analysisId,
                sampleSource: parsed.sampleSource,
                tumorType: parsed.tumorType,
                sequencingType: parsed.sequencingType,
                referenceGenome: parsed.referenceGenome,
                sequencingGermlineControl: parsed.sequencingGermlineControl,
                ...(parsed.sequencingTypeOther === undefined ? {} : { sequencingTypeOther: parsed.sequencingTypeOther }),
                ...source,
            },
        });
        this.log.info(`Direct analysis created successfully: ${parsed.analysisId}`);
        return analysis;
    }

    async delete(projectUuid: string, analysisUuid: string): Promise<Analysis | null> {
        const path = this.item(projectUuid, analysisUuid);
        this.log.info(`Deleting analysis: ${analysisUuid}`);
        const deleted = await this.transport.optionalJson(AnalysisSchema, {
            method: 'DELETE',
            path,
            action: 'Failed to delete analysis',
        });
        this.log.info(`Analysis deleted successfully: ${analysisUuid}`);
        return deleted;
    }

    private async resolveSource(projectUuid: string, input: AnalysisInput): Promise<AnalysisSource> {
        if (input.inputFiles) {
            for (const filePath of input.inputFiles) {
                await assertReadableFile(filePath);
            }
            const inputFiles: string[] = [];
            for (const filePath of input.inputFiles) {
                inputFiles.push(await this.uploads.uploadFile(projectUuid, filePath));
            }
            return { inputFiles };
        }
        if (input.inputText === undefined || input.inputFormat === undefined) {
            throw new ValidationError('Format must be specified when using inputText');
        }
        return { inputText: input.inputText, format: input.inputFormat };
    }
}
