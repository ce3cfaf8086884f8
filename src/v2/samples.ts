import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { parseInput, requireId, segment } from '../validation.js';
import {
    SampleInputSchema,
    SamplePageSchema,
    SampleSchema,
    SampleUpdateSchema,
    type Pagination,
    type Sample,
    type SampleInput,
    type SamplePage,
    type SampleUpdate,
} from './types.js';

export interface SampleListOptions extends Pagination {
    projectUuids?: string[];
    patientUuids?: string[];
}

// GET requests cannot carry a body, so the uuid lists go into the query string.
function joinUuids(uuids: string[] | undefined): string | undefined {
    return uuids && uuids.length > 0 ? uuids.join(',') : undefined;
}

function samplePath(projectUuid: string, sampleUuid: string): string {
    return `/${segment(requireId(projectUuid, 'projectUuid'))}/sample/${segment(requireId(sampleUuid, 'sampleUuid'))}`;
}

export class SamplesApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly log: Logger
    ) {}

    async listAll(projectUuids: string[], patientUuids?: string[]): Promise<SamplePage> {
        this.log.info(`Fetching samples for projects: ${projectUuids.join(', ')}`);
        const samples = await this.transport.json(SamplePageSchema, {
            method: 'GET',
            path: '/sample/full',
            action: 'Failed to get samples',
            query: { projectUuids: joinUuids(projectUuids), patientUuids: joinUuids(patientUuids) },
        });
        this.log.info('Samples retrieved successfully');
        return samples;
    }

    async list(projectUuid: string, options: SampleListOptions = {}): Promise<SamplePage> {
        requireId(projectUuid, 'projectUuid');
        const { size = 10, page = 0 } = options;
        this.log.info({ size, page }, `Fetching samples for project: ${projectUuid}`);
        const samples = await this.transport.json(SamplePageSchema, {
            method: 'GET',
            path: `/${segment(projectUuid)}/sample`,
            action: 'Failed to get samples',
            query: {
                projectUuids: joinUuids(options.projectUuids),
                patientUuids: joinUuids(options.patientUuids),
                size,
                page,
            },
        });
        this.log.info('Samples retrieved successfully');
        return samples;
    }

    async get(projectUuid: string, sampleUuid: string): Promise<Sample> {
        const path = samplePath(projectUuid, sampleUuid);
        this.log.info(`Fetching sample ${sampleUuid} for project ${projectUuid}`);
        const sample = await this.transport.json(SampleSchema, {
            method: 'GET',
            path,
            action: 'Failed to get sample',
        });
        this.log.info(`Sample retrieved successfully: ${sampleUuid}`);
        return sample;
    }

    async create(projectUuid: string, sampleUuid: string, input: SampleInput = {}): Promise<Sample> {
        const path = samplePath(projectUuid, sampleUuid);
        const body = parseInput(SampleInputSchema, input, 'sample');
        this.log.info(`Creating new sample with ID: ${body.sampleId ?? sampleUuid}`);
        const sample = await this.transport.json(SampleSchema, {
            method: 'POST',
            path,
            action: 'Failed to create sample',
            json: body,
        });
        this.log.info(`Sample created successfully: ${sampleUuid}`);
        return sample;
    }

    async update(projectUuid: string, sampleUuid: string, input: SampleUpdate): Promise<Sample> {
        const path = samplePath(projectUuid, sampleUuid);
        const body = parseInput(SampleUpdateSchema, input, 'sample');
        this.log.info(`Updating sample: ${sampleUuid}`);
        const sample = await this.transport.json(SampleSchema, {
            method: 'PUT',
            path,
            action: 'Failed to update sample',
            json: body,
        });
        this.log.info(`Sample updated successfully: ${sampleUuid}`);
        return sample;
    }

    async delete(projectUuid: string, sampleUuid: string): Promise<Sample | null> {
        const path = samplePath(projectUuid, sampleUuid);
        this.log.info(`Deleting sample ${sampleUuid} for project ${projectUuid}`);
        const deleted = await this.transport.optionalJson(SampleSchema, {
            method: 'DELETE',
            path,
            action: 'Failed to delete sample',
        });
        this.log.info(`Sample deleted successfully: ${sampleUuid}`);
        return deleted;
    }
}
