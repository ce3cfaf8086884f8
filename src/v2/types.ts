import { z } from 'zod';

// -----------------------------------------------------------------------------
// Enumerations accepted by the v2 API
// -----------------------------------------------------------------------------

export const GenderSchema = z.enum(['MALE', 'FEMALE', 'UNDIFFERENTIATED', 'UNKNOWN']);
export const SmokingStatusSchema = z.enum(['CURRENT', 'PAST', 'NEVER', 'UNKNOWN']);
export const VitalStatusSchema = z.enum(['ALIVE', 'DEAD', 'UNKNOWN']);
export const PerformanceStatusSchema = z.enum(['NORMAL', 'RESTRICTED', 'SELF_CARE', 'AMBULATORY', 'DISABLED']);
export const SampleSourceSchema = z.enum([
    'FROZEN_SPECIMEN',
    'PARAFFIN_EMBEDDED_TISSUE_FFPE',
    'CIRCULATING_TUMOR_DERIVED_DNA',
    'BLOOD',
    'PLASMA',
    'PROTEIN',
    'RNA',
    'DNA',
    'PERIPHERAL_BLOOD_MONONUCLEAR_CELL',
    'TUMOR_CELL_LINE',
    'URINE',
    'SALIVA',
    'SERUM',
    'XENOGRAFT',
    'UNKNOWN',
]);
export const SampleTypeSchema = z.enum(['NEOPLASM', 'METASTATIC', 'RECURRENT_TUMOR', 'PRIMARY_TUMOR', 'UNKNOWN']);
export const GermlineControlSchema = z.enum(['YES', 'NO', 'UNKNOWN']);
export const ReferenceGenomeSchema = z.enum(['HG19', 'HG38']);
export const ResultKindSchema = z.enum(['summary', 'mutations', 'biomarkers', 'cnas', 'fusions']);

export type Gender = z.infer<typeof GenderSchema>;
export type SmokingStatus = z.infer<typeof SmokingStatusSchema>;
export type VitalStatus = z.infer<typeof VitalStatusSchema>;
export type PerformanceStatus = z.infer<typeof PerformanceStatusSchema>;
export type SampleSource = z.infer<typeof SampleSourceSchema>;
export type SampleType = z.infer<typeof SampleTypeSchema>;
export type GermlineControl = z.infer<typeof GermlineControlSchema>;
export type ReferenceGenome = z.infer<typeof ReferenceGenomeSchema>;
export type ResultKind = z.infer<typeof ResultKindSchema>;

// -----------------------------------------------------------------------------
// Request bodies. Every field is optional unless the endpoint needs it;
// unset fields are left out of the JSON rather than sent as null.
// -----------------------------------------------------------------------------

export const ComorbiditySchema = z.object({
    pathologyCode: z.string().optional(),
    diagnosisDate: z.string().optional(),
    endDate: z.string().optional(),
});

export const TreatmentSchema = z.object({
    treatmentId: z.string().optional(),
    name: z.string().optional(),
    type: z.string().optional(),
    typeOther: z.string().optional(),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
    code: z.string().optional(),
    lineNumber: z.string().optional(),
    comments: z.string().optional(),
    responseStatus: z.array(z.record(z.unknown())).optional(),
});

export const GermlineAlterationSchema = z.object({ name: z.string().optional() });
export const OtherMolecularAnalysisSchema = z.object({ name: z.string().optional(), nameOther: z.string().optional() });
export const FamilyCancerSchema = z.object({ topographyCode: z.string().optional(), parentage: z.string().optional() });

export const PatientInputSchema = z.object({
    patientId: z.string().optional(),
    birthDate: z.string().optional(),
    gender: GenderSchema.optional(),
    diagnosisAge: z.number().int().nonnegative().optional(),
    diagnosisDate: z.string().optional(),
    hospital: z.string().optional(),
    smokingStatus: SmokingStatusSchema.optional(),
    comments: z.string().optional(),
    vitalStatus: VitalStatusSchema.optional(),
    performanceStatus: PerformanceStatusSchema.optional(),
    lastFollowUpDate: z.string().optional(),
    comorbidities: z.array(ComorbiditySchema).optional(),
    treatments: z.array(TreatmentSchema).optional(),
    germlineAlterations: z.array(GermlineAlterationSchema).optional(),
    otherMolecularAnalysis: z.array(OtherMolecularAnalysisSchema).optional(),
    familyCancers: z.array(FamilyCancerSchema).optional(),
});
export type PatientInput = z.infer<typeof PatientInputSchema>;

export const BiomarkerSchema = z.object({
    code: z.string().optional(),
    codeOther: z.string().optional(),
    value: z.string().optional(),
    unit: z.string().optional(),
});

export const SampleInputSchema = z.object({
    patientUuid: z.string().optional(),
    sampleId: z.string().optional(),
    source: SampleSourceSchema.optional(),
    tumorType: z.string().optional(),
    tumorSubType: z.string().optional(),
    purity: z.number().int().min(0).max(100).optional(),
    type: SampleTypeSchema.optional(),
    metastaticSite: z.string().optional(),
    ageAtSampling: z.number().int().nonnegative().optional(),
    informedConsentNotes: z.string().optional(),
    shareForResearch: z.boolean().optional(),
    date: z.string().optional(),
    biomarkers: z.array(BiomarkerSchema).optional(),
});
export type SampleInput = z.infer<typeof SampleInputSchema>;

// Biomarkers can only be set when the sample is created
export const SampleUpdateSchema = SampleInputSchema.omit({ biomarkers: true });
export type SampleUpdate = z.infer<typeof SampleUpdateSchema>;

export const SequencingInputSchema = z.object({
    sampleUuid: z.string().optional(),
    sequencingId: z.string().optional(),
    type: z.string().optional(),
    typeOther: z.string().optional(),
    center: z.string().optional(),
    centerOther: z.string().optional(),
    germlineControl: GermlineControlSchema.optional(),
    comments: z.string().optional(),
    date: z.string().optional(),
});
export type SequencingInput = z.infer<typeof SequencingInputSchema>;

/** Either `inputFiles` (local paths, uploaded first) or `inputText` with `inputFormat`. */
export const AnalysisInputSchema = z.object({
    analysisId: z.string().min(1),
    referenceGenome: ReferenceGenomeSchema,
    inputFiles: z.array(z.string().min(1)).min(1).optional(),
    inputText: z.string().optional(),
    inputFormat: z.string().optional(),
});
export type AnalysisInput = z.infer<typeof AnalysisInputSchema>;

export const DirectAnalysisInputSchema = AnalysisInputSchema.extend({
    patientId: z.string().min(1),
    sampleId: z.string().min(1),
    sequencingId: z.string().min(1),
    sampleSource: SampleSourceSchema,
    tumorType: z.string().min(1),
    sequencingType: z.string().min(1),
    sequencingGermlineControl: GermlineControlSchema,
    sequencingTypeOther: z.string().optional(),
});
export type DirectAnalysisInput = z.infer<typeof DirectAnalysisInputSchema>;

// -----------------------------------------------------------------------------
// Query filters
// -----------------------------------------------------------------------------

export interface Pagination {
    size?: number;
    page?: number;
}

export interface PatientFilters {
    patientId?: string;
    gender?: Gender;
    diagnosisDateEquals?: string;
    lastCgiAnalysisDateEquals?: string;
    birthDateBefore?: string;
    birthDateAfter?: string;
}

export interface SequencingFilters {
    projectUuids?: string[];
    patientUuids?: string[];
    sampleUuids?: string[];
}

// -----------------------------------------------------------------------------
// Responses. Only the identifying fields are typed; everything else the
// server sends is kept as-is.
// -----------------------------------------------------------------------------

const IdSchema = z.union([z.string(), z.number()]);

export const ProjectSchema = z.object({ uuid: z.string().nullish(), name: z.string().nullish() }).passthrough();
export const PatientSchema = z.object({ uuid: z.string().nullish(), patientId: z.string().nullish() }).passthrough();
export const SampleSchema = z.object({ uuid: z.string().nullish(), sampleId: z.string().nullish() }).passthrough();
export const SequencingSchema = z
    .object({ uuid: z.string().nullish(), sequencingId: z.string().nullish() })
    .passthrough();
export const NamedEntitySchema = z
    .object({ id: IdSchema.nullish(), uuid: z.string().nullish(), name: z.string().nullish() })
    .passthrough();
export const AnalysisSchema = z
    .object({ uuid: z.string().nullish(), analysisId: z.string().nullish(), status: z.string().nullish() })
    .passthrough();

/** Server-side paging envelope; some deployments answer with a bare array instead. */
export function pageOf<T extends z.ZodTypeAny>(item: T) {
    return z.union([
        z.array(item),
        z
            .object({
                content: z.array(item).optional(),
                totalElements: z.number().optional(),
                totalPages: z.number().optional(),
                number: z.number().optional(),
                size: z.number().optional(),
            })
            .passthrough(),
    ]);
}

export const ProjectPageSchema = pageOf(ProjectSchema);
export const PatientPageSchema = pageOf(PatientSchema);
export const SamplePageSchema = pageOf(SampleSchema);
export const SequencingPageSchema = pageOf(SequencingSchema);
export const NamedEntityPageSchema = pageOf(NamedEntitySchema);
export const AnalysisPageSchema = pageOf(AnalysisSchema);

export const TemporalUploadSlotSchema = z
    .object({ uuid: z.string().nullish(), code: z.string().nullish() })
    .passthrough();
export const UploadedFileSchema = z.object({ uuid: z.string().min(1) }).passthrough();

export type Project = z.infer<typeof ProjectSchema>;
export type Patient = z.infer<typeof PatientSchema>;
export type Sample = z.infer<typeof SampleSchema>;
export type Sequencing = z.infer<typeof SequencingSchema>;
export type NamedEntity = z.infer<typeof NamedEntitySchema>;
export type Analysis = z.infer<typeof AnalysisSchema>;
export type ProjectPage = z.infer<typeof ProjectPageSchema>;
export type PatientPage = z.infer<typeof PatientPageSchema>;
export type SamplePage = z.infer<typeof SamplePageSchema>;
export type SequencingPage = z.infer<typeof SequencingPageSchema>;
export type NamedEntityPage = z.infer<typeof NamedEntityPageSchema>;
export type AnalysisPage = z.infer<typeof AnalysisPageSchema>;
export type TemporalUploadSlot = z.infer<typeof TemporalUploadSlotSchema>;
