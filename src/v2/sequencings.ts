import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { parseInput, requireId, segment } from '../validation.js';
import {
    SequencingInputSchema,
    SequencingPageSchema,
    SequencingSchema,
    type Pagination,
    type Sequencing,
    type SequencingFilters,
    type SequencingInput,
    type SequencingPage,
} from './types.js';

export interface SequencingSearch extends SequencingFilters {
    patientId?: string;
}

function sequencingPath(projectUuid: string, sequencingUuid: string): string {
    return `/${segment(requireId(projectUuid, 'projectUuid'))}/sequencing/${segment(requireId(sequencingUuid, 'sequencingUuid'))}`;
}

export class SequencingsApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly log: Logger
    ) {}

    async listAll(search: SequencingSearch = {}): Promise<SequencingPage> {
        this.log.info('Fetching all sequencings');
        const sequencings = await this.transport.json(SequencingPageSchema, {
            method: 'GET',
            path: '/sequencing/full',
            action: 'Failed to get sequencings',
            query: {
                projectUuids: search.projectUuids,
                patientUuids: search.patientUuids,
                sampleUuids: search.sampleUuids,
                patientId: search.patientId,
            },
        });
        this.log.info('Sequencings retrieved successfully');
        return sequencings;
    }

    async list(projectUuid: string, options: SequencingFilters & Pagination = {}): Promise<SequencingPage> {
        requireId(projectUuid, 'projectUuid');
        const { size = 10, page = 0 } = options;
        this.log.info({ size, page }, `Fetching sequencings for project: ${projectUuid}`);
        const sequencings = await this.transport.json(SequencingPageSchema, {
            method: 'GET',
            path: `/${segment(projectUuid)}/sequencing`,
            action: 'Failed to get sequencings',
            query: {
                projectUuids: options.projectUuids,
                patientUuids: options.patientUuids,
                sampleUuids: options.sampleUuids,
                size,
                page,
            },
        });
        this.log.info('Sequencings retrieved successfully');
        return sequencings;
    }

    async get(projectUuid: string, sequencingUuid: string): Promise<Sequencing> {
        const path = sequencingPath(projectUuid, sequencingUuid);
        this.log.info(`Fetching sequencing: ${sequencingUuid}`);
        const sequencing = await this.transport.json(SequencingSchema, {
            method: 'GET',
            path,
            action: 'Failed to get sequencing',
        });
        this.log.info(`Sequencing retrieved successfully: ${sequencingUuid}`);
        return sequencing;
    }

    async create(projectUuid: string, sequencingUuid: string, input: SequencingInput = {}): Promise<Sequencing> {
        const path = sequencingPath(projectUuid, sequencingUuid);
        const body = parseInput(SequencingInputSchema, input, 'sequencing');
        this.log.info(`Creating new sequencing with ID: ${body.sequencingId ?? sequencingUuid}`);
        const sequencing = await this.transport.json(SequencingSchema, {
            method: 'POST',
            path,
            action: 'Failed to create sequencing',
            json: body,
        });
        this.log.info(`Sequencing created successfully: ${sequencingUuid}`);
        return sequencing;
    }

    async update(projectUuid: string, sequencingUuid: string, input: SequencingInput): Promise<Sequencing> {
        const path = sequencingPath(projectUuid, sequencingUuid);
        const body = parseInput(SequencingInputSchema, input, 'sequencing');
        this.log.info(`Updating sequencing: ${sequencingUuid}`);
        const sequencing = await this.transport.json(SequencingSchema, {
            method: 'PUT',
            path,
            action: 'Failed to update sequencing',
            json: body,
        });
        this.log.info(`Sequencing updated successfully: ${sequencingUuid}`);
        return sequencing;
    }

    async delete(projectUuid: string, sequencingUuid: string): Promise<Sequencing | null> {
        const path = sequencingPath(projectUuid, sequencingUuid);
        this.log.info(`Deleting sequencing: ${sequencingUuid}`);
        const deleted = await this.transport.optionalJson(SequencingSchema, {
            method: 'DELETE',
            path,
            action: 'Failed to delete sequencing',
        });
        this.log.info(`Sequencing deleted successfully: ${sequencingUuid}`);
        return deleted;
    }
}
