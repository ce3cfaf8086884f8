import { parseInput } from '../validation.js';
import type {
    NewAnalysis,
    NewSample,
    NewSequencing,
    SubmissionApi,
    SubmissionRequest,
    SubmissionScope,
} from '../workflow.js';
import type { LegacyClinicsClient } from './client.js';
import {
    LegacyGenomeReferenceSchema,
    LegacyGermlineCallingSchema,
    LegacySampleSourceSchema,
    LegacySequencingTypeSchema,
} from './types.js';

export class LegacySubmissionApi implements SubmissionApi {
    readonly name = 'legacy';

    constructor(private readonly client: LegacyClinicsClient) {}

    validate(request: SubmissionRequest): void {
        parseInput(LegacySampleSourceSchema, request.sampleSource, 'sample source');
        parseInput(LegacySequencingTypeSchema, request.sequencingType, 'sequencing type');
        parseInput(LegacyGermlineCallingSchema, request.callingGermline, 'germline calling');
        parseInput(LegacyGenomeReferenceSchema, request.reference, 'genome reference');
    }

    getProject(projectId: string): Promise<unknown> {
        return this.client.getProject(projectId);
    }

    createPatient(projectId: string, key: string): Promise<string> {
        return this.client.createPatient(projectId, key);
    }

    deletePatient(projectId: string, patientId: string): Promise<void> {
        return this.client.deletePatient(projectId, patientId);
    }

    async createSample(projectId: string, patientId: string, sample: NewSample): Promise<string> {
        return this.client.createSample(projectId, patientId, {
            key: sample.key,
            source: parseInput(LegacySampleSourceSchema, sample.source, 'sample source'),
            cancerType: sample.cancerType,
        });
    }

    async createSequencing(
        projectId: string,
        patientId: string,
        sampleId: string,
        sequencing: NewSequencing
    ): Promise<string> {
        return this.client.createSequencing(projectId, patientId, sampleId, {
            key: sequencing.key,
            type: parseInput(LegacySequencingTypeSchema, sequencing.type, 'sequencing type'),
            callingGermline: parseInput(LegacyGermlineCallingSchema, sequencing.callingGermline, 'germline calling'),
        });
    }

    async submitAnalysis(scope: SubmissionScope, analysis: NewAnalysis): Promise<string> {
        return this.client.createAnalysis(scope, {
            files: analysis.files,
            reference: parseInput(LegacyGenomeReferenceSchema, analysis.reference, 'genome reference'),
            title: analysis.title,
        });
    }

    analysisUrl(projectId: string, analysisId: string): string {
        return this.client.analysisUrl(projectId, analysisId);
    }
}
