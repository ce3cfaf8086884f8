import { DEFAULT_TIMEOUT_MS, V2_DEFAULT_BASE_URL } from '../config.js';
import { v2Headers } from '../credentials.js';
import { HttpTransport } from '../http.js';
import { createLogger, type Logger } from '../logger.js';
import { requireId } from '../validation.js';
import { AnalysesApi } from './analyses.js';
import { CatalogApi, FullCatalogApi, hospitalsApi, sequencingCentersApi, sequencingTypesApi } from './catalogs.js';
import { PatientsApi } from './patients.js';
import { ProjectsApi } from './projects.js';
import { SamplesApi } from './samples.js';
import { SequencingsApi } from './sequencings.js';
import { UploadsApi } from './uploads.js';

export interface ClinicsClientOptions {
    /** Personal API token, sent as the `access_token` header. */
    token: string;
    baseUrl?: string;
    timeoutMs?: number;
    logger?: Logger;
}

/**
 * Entry point for the v2 API. One instance per credential; every resource
 * shares the same transport.
 */
export class ClinicsClient {
    readonly projects: ProjectsApi;
    readonly patients: PatientsApi;
    readonly samples: SamplesApi;
    readonly sequencings: SequencingsApi;
    readonly sequencingCenters: FullCatalogApi;
    readonly sequencingTypes: FullCatalogApi;
    readonly hospitals: CatalogApi;
    readonly uploads: UploadsApi;
    readonly analyses: AnalysesApi;

    constructor(options: ClinicsClientOptions) {
        const token = requireId(options.token, 'token');
        const logger = options.logger ?? createLogger('cgi-clinics-v2');
        const transport = new HttpTransport({
            baseUrl: options.baseUrl ?? V2_DEFAULT_BASE_URL,
            headers: v2Headers(token),
            timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            logger,
        });

        this.projects = new ProjectsApi(transport, logger);
        this.patients = new PatientsApi(transport, logger);
        this.samples = new SamplesApi(transport, logger);
        this.sequencings = new SequencingsApi(transport, logger);
        this.sequencingCenters = sequencingCentersApi(transport, logger);
        this.sequencingTypes = sequencingTypesApi(transport, logger);
        this.hospitals = hospitalsApi(transport, logger);
        this.uploads = new UploadsApi(transport, logger);
        this.analyses = new AnalysesApi(transport, this.uploads, logger);
    }
}
