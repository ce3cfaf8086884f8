import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { requireId, segment } from '../validation.js';
import { NamedEntityPageSchema, NamedEntitySchema, type NamedEntity, type NamedEntityPage, type Pagination } from './types.js';

interface CatalogDescriptor {
    /** Path segment below `/project/{uuid}/`. */
    resource: string;
    /** Human label used in log lines and error messages. */
    label: string;
    /** Some collections only answer on the slash-terminated path. */
    trailingSlash?: boolean;
}

/**
 * Project-scoped lists of names (hospitals, sequencing centers, sequencing
 * types) share one endpoint shape: paged list, create, rename, delete.
 */
export class CatalogApi {
    constructor(
        protected readonly transport: HttpTransport,
        protected readonly log: Logger,
        protected readonly descriptor: CatalogDescriptor
    ) {}

    protected base(projectUuid: string): string {
        return `/project/${segment(requireId(projectUuid, 'projectUuid'))}/${this.descriptor.resource}`;
    }

    private collection(projectUuid: string): string {
        return this.descriptor.trailingSlash ? `${this.base(projectUuid)}/` : this.base(projectUuid);
    }

    private item(projectUuid: string, id: string): string {
        return `${this.base(projectUuid)}/${segment(requireId(id, `${this.descriptor.label} id`))}`;
    }

    async list(projectUuid: string, { size = 10, page = 0 }: Pagination = {}): Promise<NamedEntityPage> {
        const path = this.collection(projectUuid);
        const { label } = this.descriptor;
        this.log.info({ size, page }, `Fetching ${label}s for project: ${projectUuid}`);
        const entries = await this.transport.json(NamedEntityPageSchema, {
            method: 'GET',
            path,
            action: `Failed to get ${label}s`,
            query: { size, page },
        });
        this.log.info(`${label}s retrieved successfully`);
        return entries;
    }

    async create(projectUuid: string, name: string): Promise<NamedEntity> {
        const path = this.collection(projectUuid);
        requireId(name, 'name');
        const { label } = this.descriptor;
        this.log.info(`Creating ${label}: ${name}`);
        const created = await this.transport.json(NamedEntitySchema, {
            method: 'POST',
            path,
            action: `Failed to create ${label}`,
            json: { name },
        });
        this.log.info(`${label} created successfully: ${name}`);
        return created;
    }

    async update(projectUuid: string, id: string, name: string): Promise<NamedEntity> {
        const path = this.item(projectUuid, id);
        requireId(name, 'name');
        const { label } = this.descriptor;
        this.log.info(`Updating ${label} ${id}`);
        const updated = await this.transport.json(NamedEntitySchema, {
            method: 'PUT',
            path,
            action: `Failed to update ${label}`,
            json: { name },
        });
        this.log.info(`${label} updated successfully: ${id}`);
        return updated;
    }

    async delete(projectUuid: string, id: string): Promise<NamedEntity | null> {
        const path = this.item(projectUuid, id);
        const { label } = this.descriptor;
        this.log.info(`Deleting ${label} ${id}`);
        const deleted = await this.transport.optionalJson(NamedEntitySchema, {
            method: 'DELETE',
            path,
            action: `Failed to delete ${label}`,
        });
        this.log.info(`${label} deleted successfully: ${id}`);
        return deleted;
    }
}

/** Catalog that also exposes the unpaged `/full` listing. */
export class FullCatalogApi extends CatalogApi {
    async listAll(projectUuid: string): Promise<NamedEntityPage> {
        const path = `${this.base(projectUuid)}/full`;
        const { label } = this.descriptor;
        this.log.info(`Fetching all ${label}s for project: ${projectUuid}`);
        const entries = await this.transport.json(NamedEntityPageSchema, {
            method: 'GET',
            path,
            action: `Failed to get ${label}s`,
        });
        this.log.info(`${label}s retrieved successfully`);
        return entries;
    }
}

export function hospitalsApi(transport: HttpTransport, log: Logger): CatalogApi {
    return new CatalogApi(transport, log, { resource: 'hospital', label: 'hospital' });
}

export function sequencingCentersApi(transport: HttpTransport, log: Logger): FullCatalogApi {
    return new FullCatalogApi(transport, log, { resource: 'sequencing-center', label: 'sequencing center' });
}

export function sequencingTypesApi(transport: HttpTransport, log: Logger): FullCatalogApi {
    return new FullCatalogApi(transport, log, {
        resource: 'sequencing-type',
        label: 'sequencing type',
        trailingSlash: true,
    });
}
