import { z } from 'zod';

export const LegacySampleSourceSchema = z.enum(['tissue', 'liquid', 'unknown']);

export const LegacySequencingTypeSchema = z.enum([
    'panel_14gene',
    'panel_24gene',
    'panel_32gene_hematology',
    'panel_161gene_pathology',
    'agilent_kinderonko',
    'agilent_lymphom',
    'amplicon_targeted_panel',
    'archer_ctl_custom',
    'archer_kinderonko',
    'archer_lung',
    'archer_sarcoma',
    'archer_salivary',
    'avenio',
    'custom_panel',
    'genoncologydx',
    'hrd',
    'guardant360',
    'ngs_brca',
    'ngs_kras_nras',
    'ngs_mel',
    'ngs_pros',
    'ngs_pros_atm',
    'nngm_2',
    'oca',
    'ofa',
    'opa',
    'profiler_v5',
    'sophiagenetics_sts_custom',
    'sophiagenetics_great_v3_custom',
    'tso500',
    'vhio300',
    'wes',
    'wgs',
    'unknown',
    'other',
]);

/** Whether mutation calling ran with a germline control sample. */
export const LegacyGermlineCallingSchema = z.enum(['cancer_only', 'cancer_germline', 'unknown']);
export const LegacyGenomeReferenceSchema = z.enum(['hg38', 'hg19']);

export type LegacySampleSource = z.infer<typeof LegacySampleSourceSchema>;
export type LegacySequencingType = z.infer<typeof LegacySequencingTypeSchema>;
export type LegacyGermlineCalling = z.infer<typeof LegacyGermlineCallingSchema>;
export type LegacyGenomeReference = z.infer<typeof LegacyGenomeReferenceSchema>;

/** Identifies one sequencing; uploads and analyses hang off it. */
export interface SequencingScope {
    projectId: string;
    patientId: string;
    sampleId: string;
    sequencingId: string;
}

export interface LegacySampleInput {
    key: string;
    source: LegacySampleSource;
    cancerType: string;
}

export interface LegacySequencingInput {
    key: string;
    type: LegacySequencingType;
    callingGermline: LegacyGermlineCalling;
}

export interface UploadTicket {
    fileId: string;
    uploadUrl: string;
}

export interface AnalysisStatus {
    done: boolean;
    status: string;
}

// --- Responses ---

const RecordIdSchema = z.union([z.string(), z.number()]).transform(String);

export const CreatedRecordSchema = z.object({ id: RecordIdSchema }).passthrough();
export const LegacyRecordSchema = z.record(z.unknown());
export const UploadTicketSchema = z
    .object({ file_id: RecordIdSchema, upload_url: z.string().min(1) })
    .passthrough();
export const AnalysisStatusSchema = z.object({ status: z.string() }).passthrough();
export const ResultFilesSchema = z
    .object({ files: z.array(z.object({ name: z.string(), url: z.string().min(1) }).passthrough()) })
    .passthrough();

export type LegacyRecord = z.infer<typeof LegacyRecordSchema>;
