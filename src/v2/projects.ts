import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { requireId, segment } from '../validation.js';
import {
    ProjectPageSchema,
    ProjectSchema,
    type Pagination,
    type Project,
    type ProjectPage,
} from './types.js';

export interface ProjectListOptions extends Pagination {
    name?: string;
}

/**
 * Projects are the root container; everything else hangs off a project uuid.
 * `listAll` only works for users with the superadmin role.
 */
export class ProjectsApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly log: Logger
    ) {}

    async listAll(options: ProjectListOptions = {}): Promise<ProjectPage> {
        const { name, size = 10, page = 0 } = options;
        this.log.info('Fetching all projects');
        const projects = await this.transport.json(ProjectPageSchema, {
            method: 'GET',
            path: '/project/full',
            action: 'Failed to get projects',
            query: { name, size, page },
        });
        this.log.info('Projects retrieved successfully');
        return projects;
    }

    async list(options: ProjectListOptions = {}): Promise<ProjectPage> {
        const { name, size = 10, page = 0 } = options;
        this.log.info({ size, page }, 'Fetching projects page');
        const projects = await this.transport.json(ProjectPageSchema, {
            method: 'GET',
            path: '/project',
            action: 'Failed to get projects',
            query: { name, size, page },
        });
        this.log.info('Projects retrieved successfully');
        return projects;
    }

    async get(projectUuid: string): Promise<Project> {
        requireId(projectUuid, 'projectUuid');
        this.log.info(`Fetching project: ${projectUuid}`);
        const project = await this.transport.json(ProjectSchema, {
            method: 'GET',
            path: `/project/${segment(projectUuid)}`,
            action: 'Failed to get project',
        });
        this.log.info(`Project retrieved successfully: ${projectUuid}`);
        return project;
    }

    async create(name: string): Promise<Project> {
        requireId(name, 'name');
        this.log.info(`Creating project: ${name}`);
        const project = await this.transport.json(ProjectSchema, {
            method: 'POST',
            path: '/project',
            action: 'Failed to create project',
            json: { name },
        });
        this.log.info(`Project created successfully: ${name}`);
        return project;
    }

    async delete(projectUuid: string): Promise<void> {
        requireId(projectUuid, 'projectUuid');
        this.log.info(`Deleting project: ${projectUuid}`);
        await this.transport.empty({
            method: 'DELETE',
            path: `/project/${segment(projectUuid)}`,
            action: 'Failed to delete project',
        });
        this.log.info(`Project deleted successfully: ${projectUuid}`);
    }
}
