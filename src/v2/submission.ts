import { v4 as uuidv4 } from 'uuid';

import { parseInput } from '../validation.js';
import type {
    NewAnalysis,
    NewSample,
    NewSequencing,
    SubmissionApi,
    SubmissionRequest,
    SubmissionScope,
} from '../workflow.js';
import type { ClinicsClient } from './client.js';
import {
    GermlineControlSchema,
    ReferenceGenomeSchema,
    SampleSourceSchema,
    type GermlineControl,
    type ReferenceGenome,
    type SampleSource,
} from './types.js';

// Germline calling as the legacy API names it.
const GERMLINE_CALLING_ALIASES: Record<string, GermlineControl> = {
    cancer_germline: 'YES',
    cancer_only: 'NO',
};

function germlineControl(value: string): GermlineControl {
    const alias = GERMLINE_CALLING_ALIASES[value.toLowerCase()];
    return alias ?? parseInput(GermlineControlSchema, value.toUpperCase(), 'germline control');
}

function sampleSource(value: string): SampleSource {
    return parseInput(SampleSourceSchema, value.toUpperCase(), 'sample source');
}

function referenceGenome(value: string): ReferenceGenome {
    return parseInput(ReferenceGenomeSchema, value.toUpperCase(), 'reference genome');
}

/**
 * v2 records are keyed by client-generated uuids; the human keys travel in
 * the `patientId` / `sampleId` / `sequencingId` fields.
 */
export class V2SubmissionApi implements SubmissionApi {
    readonly name = 'v2';

    constructor(
        private readonly client: ClinicsClient,
        private readonly newUuid: () => string = uuidv4
    ) {}

    validate(request: SubmissionRequest): void {
        sampleSource(request.sampleSource);
        germlineControl(request.callingGermline);
        referenceGenome(request.reference);
    }

    getProject(projectId: string): Promise<unknown> {
        return this.client.projects.get(projectId);
    }

    async createPatient(projectId: string, key: string): Promise<string> {
        const patientUuid = this.newUuid();
        await this.client.patients.create(projectId, patientUuid, { patientId: key });
        return patientUuid;
    }

    async deletePatient(projectId: string, patientId: string): Promise<void> {
        await this.client.patients.delete(projectId, patientId);
    }

    async createSample(projectId: string, patientId: string, sample: NewSample): Promise<string> {
        const sampleUuid = this.newUuid();
        await this.client.samples.create(projectId, sampleUuid, {
            patientUuid: patientId,
            sampleId: sample.key,
            source: sampleSource(sample.source),
            tumorType: sample.cancerType,
        });
        return sampleUuid;
    }

    async createSequencing(
        projectId: string,
        _patientId: string,
        sampleId: string,
        sequencing: NewSequencing
    ): Promise<string> {
        const sequencingUuid = this.newUuid();
        await this.client.sequencings.create(projectId, sequencingUuid, {
            sampleUuid: sampleId,
            sequencingId: sequencing.key,
            type: sequencing.type,
            germlineControl: germlineControl(sequencing.callingGermline),
        });
        return sequencingUuid;
    }

    async submitAnalysis(scope: SubmissionScope, analysis: NewAnalysis): Promise<string> {
        const created = await this.client.analyses.create(scope.projectId, {
            analysisId: analysis.title,
            referenceGenome: referenceGenome(analysis.reference),
            inputFiles: analysis.files,
        });
        return created.uuid ?? analysis.title;
    }
}
