import { assertReadableFile } from './files.js';
import type { Logger } from './logger.js';

export interface NewSample {
    key: string;
    source: string;
    cancerType: string;
}

export interface NewSequencing {
    key: string;
    type: string;
    callingGermline: string;
}

export interface NewAnalysis {
    files: string[];
    reference: string;
    title: string;
}

export interface SubmissionScope {
    projectId: string;
    patientId: string;
    sampleId: string;
    sequencingId: string;
}

/**
 * The operations an end-to-end submission needs. Each API flavor implements
 * it on its own; vocabulary values (sources, types, references) are checked
 * by the implementation against its own enums.
 */
export interface SubmissionApi {
    readonly name: string;
    /** Throws `ValidationError` for vocabulary the flavor does not accept. */
    validate(request: SubmissionRequest): void;
    getProject(projectId: string): Promise<unknown>;
    createPatient(projectId: string, key: string): Promise<string>;
    deletePatient(projectId: string, patientId: string): Promise<void>;
    createSample(projectId: string, patientId: string, sample: NewSample): Promise<string>;
    createSequencing(projectId: string, patientId: string, sampleId: string, sequencing: NewSequencing): Promise<string>;
    /** Uploads the files and starts the analysis; resolves with its id. */
    submitAnalysis(scope: SubmissionScope, analysis: NewAnalysis): Promise<string>;
    /** Link to the analysis in the web platform, where one exists. */
    analysisUrl?(projectId: string, analysisId: string): string;
}

export interface SubmissionRequest {
    projectId: string;
    patientKey: string;
    sampleKey: string;
    sequencingKey: string;
    sampleSource: string;
    sequencingType: string;
    callingGermline: string;
    cancerType: string;
    reference: string;
    files: string[];
}

export interface SubmissionResult extends SubmissionScope {
    analysisId: string;
    title: string;
    url?: string;
}

export function analysisTitle(request: SubmissionRequest): string {
    const { patientKey, sampleKey, sequencingKey, cancerType, sampleSource, sequencingType } = request;
    return `${patientKey}.${sampleKey}.${sequencingKey} - ${cancerType}:${sampleSource}:${sequencingType}`;
}

/**
 * Creates patient, sample and sequencing, then uploads the files and starts
 * the analysis. Input and files are checked before the first request. Steps
 * run strictly in order; the first failure propagates and records created
 * before it are left in place.
 */
export async function submitAnalysisWorkflow(
    api: SubmissionApi,
    request: SubmissionRequest,
    log?: Logger
): Promise<SubmissionResult> {
    const { projectId } = request;
    api.validate(request);
    for (const file of request.files) {
        await assertReadableFile(file);
    }

    log?.info({ api: api.name }, `Checking project ${projectId}`);
    await api.getProject(projectId);

    const patientId = await api.createPatient(projectId, request.patientKey);
    log?.info(`Patient ${request.patientKey} created with ID ${patientId}`);

    const sampleId = await api.createSample(projectId, patientId, {
        key: request.sampleKey,
        source: request.sampleSource,
        cancerType: request.cancerType,
    });
    log?.info(`Sample ${request.sampleKey} created with ID ${sampleId}`);

    const sequencingId = await api.createSequencing(projectId, patientId, sampleId, {
        key: request.sequencingKey,
        type: request.sequencingType,
        callingGermline: request.callingGermline,
    });
    log?.info(`Sequencing ${request.sequencingKey} created with ID ${sequencingId}`);

    const title = analysisTitle(request);
    const scope: SubmissionScope = { projectId, patientId, sampleId, sequencingId };
    const analysisId = await api.submitAnalysis(scope, { files: request.files, reference: request.reference, title });
    log?.info(`New analysis created with ID ${analysisId}`);

    const url = api.analysisUrl?.(projectId, analysisId);
    return { ...scope, analysisId, title, ...(url === undefined ? {} : { url }) };
}
