import type { HttpTransport, Query } from '../http.js';
import type { Logger } from '../logger.js';
import { parseInput, requireId, segment } from '../validation.js';
import {
    PatientInputSchema,
    PatientPageSchema,
    PatientSchema,
    type Pagination,
    type Patient,
    type PatientFilters,
    type PatientInput,
    type PatientPage,
} from './types.js';

// The patient endpoints take snake_case filter names.
function filterQuery(filters: PatientFilters): Query {
    return {
        patient_id: filters.patientId,
        gender: filters.gender,
        diagnosis_date_equals: filters.diagnosisDateEquals,
        last_cgi_analysis_date_equals: filters.lastCgiAnalysisDateEquals,
        birth_date_before: filters.birthDateBefore,
        birth_date_after: filters.birthDateAfter,
    };
}

function patientPath(projectUuid: string, patientUuid: string): string {
    return `/${segment(requireId(projectUuid, 'projectUuid'))}/patient/${segment(requireId(patientUuid, 'patientUuid'))}`;
}

/**
 * Patients live directly under `/{projectUuid}/patient`. The caller picks the
 * patient uuid on creation.
 */
export class PatientsApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly log: Logger
    ) {}

    async listAll(projectUuid?: string, filters: PatientFilters = {}): Promise<PatientPage> {
        this.log.info('Fetching all patients');
        const patients = await this.transport.json(PatientPageSchema, {
            method: 'GET',
            path: '/patient/full',
            action: 'Failed to get patients',
            query: { project_uuid: projectUuid, ...filterQuery(filters) },
        });
        this.log.info('Patients retrieved successfully');
        return patients;
    }

    async list(projectUuid: string, options: PatientFilters & Pagination = {}): Promise<PatientPage> {
        requireId(projectUuid, 'projectUuid');
        const { size = 10, page = 0 } = options;
        this.log.info({ size, page }, `Fetching patients for project: ${projectUuid}`);
        const patients = await this.transport.json(PatientPageSchema, {
            method: 'GET',
            path: `/${segment(projectUuid)}/patient`,
            action: 'Failed to get patients',
            query: { ...filterQuery(options), size, page },
        });
        this.log.info('Patients retrieved successfully');
        return patients;
    }

    async get(projectUuid: string, patientUuid: string): Promise<Patient> {
        const path = patientPath(projectUuid, patientUuid);
        this.log.info(`Fetching patient: ${patientUuid}`);
        const patient = await this.transport.json(PatientSchema, {
            method: 'GET',
            path,
            action: 'Failed to get patient',
        });
        this.log.info(`Patient retrieved successfully: ${patientUuid}`);
        return patient;
    }

    async create(projectUuid: string, patientUuid: string, input: PatientInput = {}): Promise<Patient> {
        const path = patientPath(projectUuid, patientUuid);
        const body = parseInput(PatientInputSchema, input, 'patient');
        this.log.info(`Creating new patient with ID: ${body.patientId ?? patientUuid}`);
        const patient = await this.transport.json(PatientSchema, {
            method: 'POST',
            path,
            action: 'Failed to create patient',
            json: body,
        });
        this.log.info(`Patient created successfully: ${patientUuid}`);
        return patient;
    }

    async update(projectUuid: string, patientUuid: string, input: PatientInput): Promise<Patient> {
        const path = patientPath(projectUuid, patientUuid);
        const body = parseInput(PatientInputSchema, input, 'patient');
        this.log.info(`Updating patient: ${patientUuid}`);
        const patient = await this.transport.json(PatientSchema, {
            method: 'PUT',
            path,
            action: 'Failed to update patient',
            json: body,
        });
        this.log.info(`Patient updated successfully: ${patientUuid}`);
        return patient;
    }

    /** Resolves with the server's echo of the deleted record, or `null` on an empty reply. */
    async delete(projectUuid: string, patientUuid: string): Promise<Patient | null> {
        const path = patientPath(projectUuid, patientUuid);
        this.log.info(`Deleting patient: ${patientUuid}`);
        const deleted = await this.transport.optionalJson(PatientSchema, {
            method: 'DELETE',
            path,
            action: 'Failed to delete patient',
        });
        this.log.info(`Patient deleted successfully: ${patientUuid}`);
        return deleted;
    }
}
