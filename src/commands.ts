import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';

import { loadConfig, type AppConfig } from './config.js';
import { API_TOKEN_ENV, resolveApiToken, resolveLegacyCredentials, type Prompt } from './credentials.js';
import { LegacyClinicsClient } from './legacy/client.js';
import { LegacySubmissionApi } from './legacy/submission.js';
import { LegacyGenomeReferenceSchema } from './legacy/types.js';
import { createLogger, LogLevelSchema, type Logger } from './logger.js';
import { ClinicsClient } from './v2/client.js';
import { V2SubmissionApi } from './v2/submission.js';
import {
    GermlineControlSchema,
    ReferenceGenomeSchema,
    ResultKindSchema,
    SampleSourceSchema,
    type ResultKind,
} from './v2/types.js';
import { parseInput } from './validation.js';
import { submitAnalysisWorkflow, type SubmissionApi } from './workflow.js';

export const CLI_VERSION = '0.1.0';

/** Process-level dependencies, injectable for tests. */
export interface CliContext {
    env: NodeJS.ProcessEnv;
    /** Interactive credential prompt; absent when stdin is not a terminal. */
    prompt?: Prompt;
    stdout: (line: string) => void;
}

// --- Option schemas ---

const GlobalOptionsSchema = z.object({
    config: z.string().optional(),
    logLevel: LogLevelSchema.optional(),
});

const ApiFlavorSchema = z.enum(['legacy', 'v2']);

const SubmitOptionsSchema = GlobalOptionsSchema.extend({
    api: ApiFlavorSchema,
    projectId: z.string().min(1),
    patientKey: z.string().min(1),
    sampleKey: z.string().min(1),
    sequencingKey: z.string().min(1),
    sampleSource: z.string().min(1),
    sequencingType: z.string().min(1),
    callingGermline: z.string().min(1),
    cancerType: z.string().min(1),
    genomeReference: z.string().min(1),
    alterations: z.array(z.string().min(1)).min(1),
});

const NewAnalysisOptionsSchema = GlobalOptionsSchema.extend({
    projectId: z.string().min(1),
    patientId: z.string().min(1),
    sampleId: z.string().min(1),
    sequencingId: z.string().min(1),
    genomeReference: LegacyGenomeReferenceSchema,
    title: z.string().min(1),
    files: z.array(z.string().min(1)).min(1),
});

const DirectAnalysisOptionsSchema = GlobalOptionsSchema.extend({
    project: z.string().min(1),
    patientId: z.string().min(1),
    sampleId: z.string().min(1),
    sequencingId: z.string().min(1),
    analysisId: z.string().min(1),
    sampleSource: SampleSourceSchema,
    tumorType: z.string().min(1),
    sequencingType: z.string().min(1),
    sequencingTypeOther: z.string().optional(),
    germlineControl: GermlineControlSchema,
    referenceGenome: ReferenceGenomeSchema,
    inputFiles: z.array(z.string().min(1)).optional(),
    inputText: z.string().optional(),
    inputFormat: z.string().optional(),
});

const DownloadOptionsSchema = GlobalOptionsSchema.extend({
    project: z.string().min(1),
    analysis: z.string().min(1),
    kind: ResultKindSchema.optional(),
    output: z.string().min(1),
});

const LegacyDownloadOptionsSchema = GlobalOptionsSchema.extend({
    projectId: z.string().min(1),
    sampleId: z.string().min(1),
    sequencingId: z.string().min(1),
    analysisId: z.string().min(1),
    outputDir: z.string().min(1),
});

const DeletePatientOptionsSchema = GlobalOptionsSchema.extend({
    api: ApiFlavorSchema,
    projectId: z.string().min(1),
    patientId: z.string().min(1),
});

const StatusOptionsSchema = GlobalOptionsSchema.extend({
    projectId: z.string().min(1),
    analysisId: z.string().min(1),
});

// --- Client construction ---

interface Session {
    config: AppConfig;
    logger: Logger;
}

async function openSession(globals: z.infer<typeof GlobalOptionsSchema>, ctx: CliContext): Promise<Session> {
    const config = await loadConfig(globals.config, ctx.env);
    const logger = createLogger('cgi-clinics', globals.logLevel ?? config.logLevel);
    return { config, logger };
}

async function v2Client(session: Session, ctx: CliContext): Promise<ClinicsClient> {
    const token = await resolveApiToken({ env: ctx.env, prompt: ctx.prompt });
    return new ClinicsClient({
        token,
        baseUrl: session.config.v2.baseUrl,
        timeoutMs: session.config.v2.timeoutMs,
        logger: session.logger,
    });
}

async function legacyClient(session: Session, ctx: CliContext): Promise<LegacyClinicsClient> {
    const credentials = await resolveLegacyCredentials({ env: ctx.env, prompt: ctx.prompt });
    return new LegacyClinicsClient({
        ...credentials,
        baseUrl: session.config.legacy.baseUrl,
        platformUrl: session.config.legacy.platformUrl,
        timeoutMs: session.config.legacy.timeoutMs,
        logger: session.logger,
    });
}

async function submissionApi(
    flavor: z.infer<typeof ApiFlavorSchema>,
    session: Session,
    ctx: CliContext
): Promise<SubmissionApi> {
    if (flavor === 'v2') return new V2SubmissionApi(await v2Client(session, ctx));
    return new LegacySubmissionApi(await legacyClient(session, ctx));
}

function printJson(ctx: CliContext, value: unknown): void {
    ctx.stdout(JSON.stringify(value, null, 2));
}

// --- Program ---

export function createProgram(ctx: CliContext): Command {
    const program = new Command();

    program
        .name('cgi-clinics')
        .description('Submit and manage CGI-Clinics analyses from the command line.')
        .version(CLI_VERSION)
        .option('-c, --config <path>', 'Path to a JSON configuration file')
        .option('--log-level <level>', `Log level (${LogLevelSchema.options.join(', ')})`);

    program
        .command('submit')
        .description('Create patient, sample and sequencing, upload alteration files and start an analysis.')
        .option('--api <flavor>', `API flavor (${ApiFlavorSchema.options.join(', ')})`, 'legacy')
        .requiredOption('--project-id <id>', 'Project identifier (the `gid` URL argument on the platform)')
        .requiredOption('--patient-key <key>', 'Patient key')
        .requiredOption('--sample-key <key>', 'Sample key')
        .requiredOption('--sequencing-key <key>', 'Sequencing key')
        .requiredOption('--sample-source <source>', 'Sample source')
        .requiredOption('--sequencing-type <type>', 'Sequencing type')
        .requiredOption('--calling-germline <value>', 'Mutation calling performed with germline control sample')
        .requiredOption('--cancer-type <type>', 'Cancer type')
        .requiredOption('--genome-reference <ref>', 'Genome reference')
        .requiredOption('--alterations <files...>', 'Alteration files (e.g. --alterations file01.csv file02.vcf)')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(SubmitOptionsSchema, command.optsWithGlobals(), 'submit options');
            const session = await openSession(options, ctx);
            const api = await submissionApi(options.api, session, ctx);
            const result = await submitAnalysisWorkflow(
                api,
                {
                    projectId: options.projectId,
                    patientKey: options.patientKey,
                    sampleKey: options.sampleKey,
                    sequencingKey: options.sequencingKey,
                    sampleSource: options.sampleSource,
                    sequencingType: options.sequencingType,
                    callingGermline: options.callingGermline,
                    cancerType: options.cancerType,
                    reference: options.genomeReference,
                    files: options.alterations,
                },
                session.logger
            );
            ctx.stdout(`Patient ${options.patientKey}: ${result.patientId}`);
            ctx.stdout(`Sample ${options.sampleKey}: ${result.sampleId}`);
            ctx.stdout(`Sequencing ${options.sequencingKey}: ${result.sequencingId}`);
            ctx.stdout(`New analysis created with ID ${result.analysisId}.`);
            if (result.url) ctx.stdout(`Browse it at: ${result.url}`);
        });

    program
        .command('new-analysis')
        .description('Start an analysis on an existing legacy sequencing.')
        .requiredOption('--project-id <id>', 'Project identifier')
        .requiredOption('--patient-id <id>', 'Patient identifier')
        .requiredOption('--sample-id <id>', 'Sample identifier')
        .requiredOption('--sequencing-id <id>', 'Sequencing identifier')
        .requiredOption('--genome-reference <ref>', `Genome reference (${LegacyGenomeReferenceSchema.options.join(', ')})`)
        .requiredOption('--title <title>', 'Analysis title')
        .requiredOption('--files <files...>', 'Input files')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(NewAnalysisOptionsSchema, command.optsWithGlobals(), 'new-analysis options');
            const session = await openSession(options, ctx);
            const client = await legacyClient(session, ctx);
            const analysisId = await client.createAnalysis(
                {
                    projectId: options.projectId,
                    patientId: options.patientId,
                    sampleId: options.sampleId,
                    sequencingId: options.sequencingId,
                },
                { files: options.files, reference: options.genomeReference, title: options.title }
            );
            ctx.stdout(`New analysis created with ID ${analysisId}.`);
            ctx.stdout(`Browse it at: ${client.analysisUrl(options.projectId, analysisId)}`);
        });

    program
        .command('direct-analysis')
        .description('Create patient, sample, sequencing and analysis in one v2 request.')
        .requiredOption('--project <uuid>', 'Project uuid')
        .requiredOption('--patient-id <id>', 'Patient ID')
        .requiredOption('--sample-id <id>', 'Sample ID')
        .requiredOption('--sequencing-id <id>', 'Sequencing ID')
        .requiredOption('--analysis-id <id>', 'Analysis ID')
        .requiredOption('--sample-source <source>', `Sample source (${SampleSourceSchema.options.join(', ')})`)
        .requiredOption('--tumor-type <type>', 'Tumor type')
        .requiredOption('--sequencing-type <type>', 'Sequencing type')
        .option('--sequencing-type-other <text>', 'Free-text sequencing type when the type is OTHER')
        .requiredOption(
            '--germline-control <value>',
            `Sequencing germline control (${GermlineControlSchema.options.join(', ')})`
        )
        .requiredOption('--reference-genome <ref>', `Reference genome (${ReferenceGenomeSchema.options.join(', ')})`)
        .option('--input-files <files...>', 'Input files to upload')
        .option('--input-text <text>', 'Inline input data')
        .option('--input-format <format>', 'Format of --input-text')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(DirectAnalysisOptionsSchema, command.optsWithGlobals(), 'direct-analysis options');
            const session = await openSession(options, ctx);
            const client = await v2Client(session, ctx);
            const analysis = await client.analyses.createDirect(options.project, {
                patientId: options.patientId,
                sampleId: options.sampleId,
                sequencingId: options.sequencingId,
                analysisId: options.analysisId,
                sampleSource: options.sampleSource,
                tumorType: options.tumorType,
                sequencingType: options.sequencingType,
                sequencingTypeOther: options.sequencingTypeOther,
                sequencingGermlineControl: options.germlineControl,
                referenceGenome: options.referenceGenome,
                inputFiles: options.inputFiles,
                inputText: options.inputText,
                inputFormat: options.inputFormat,
            });
            printJson(ctx, analysis);
        });

    program
        .command('download')
        .description('Save v2 analysis results: one kind to a file, or every kind into a directory.')
        .requiredOption('--project <uuid>', 'Project uuid')
        .requiredOption('--analysis <uuid>', 'Analysis uuid')
        .option('--kind <kind>', `Result kind (${ResultKindSchema.options.join(', ')}); all kinds when omitted`)
        .requiredOption('--output <path>', 'Output file for one kind, output directory otherwise')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(DownloadOptionsSchema, command.optsWithGlobals(), 'download options');
            const session = await openSession(options, ctx);
            const client = await v2Client(session, ctx);
            const targets: Array<[ResultKind, string]> = options.kind
                ? [[options.kind, options.output]]
                : ResultKindSchema.options.map((kind): [ResultKind, string] => [kind, path.join(options.output, `${kind}.json`)]);
            for (const [kind, file] of targets) {
                await client.analyses.downloadResult(options.project, options.analysis, kind, file);
                ctx.stdout(file);
            }
        });

    program
        .command('download-legacy')
        .description('Download every result file of a legacy analysis into a directory.')
        .requiredOption('--project-id <id>', 'Project identifier')
        .requiredOption('--sample-id <id>', 'Sample identifier')
        .requiredOption('--sequencing-id <id>', 'Sequencing identifier')
        .requiredOption('--analysis-id <id>', 'Analysis identifier')
        .requiredOption('--output-dir <dir>', 'Output directory')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(LegacyDownloadOptionsSchema, command.optsWithGlobals(), 'download-legacy options');
            const session = await openSession(options, ctx);
            const client = await legacyClient(session, ctx);
            const written = await client.downloadAnalysis(
                { projectId: options.projectId, sampleId: options.sampleId, sequencingId: options.sequencingId },
                options.analysisId,
                options.outputDir
            );
            for (const file of written) ctx.stdout(file);
        });

    program
        .command('delete-patient')
        .description('Delete a patient record.')
        .option('--api <flavor>', `API flavor (${ApiFlavorSchema.options.join(', ')})`, 'legacy')
        .requiredOption('--project-id <id>', 'Project identifier')
        .requiredOption('--patient-id <id>', 'Patient identifier (uuid for v2)')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(DeletePatientOptionsSchema, command.optsWithGlobals(), 'delete-patient options');
            const session = await openSession(options, ctx);
            const api = await submissionApi(options.api, session, ctx);
            await api.deletePatient(options.projectId, options.patientId);
            ctx.stdout(`Patient ${options.patientId} deleted.`);
        });

    program
        .command('status')
        .description('Report whether a legacy analysis has finished.')
        .requiredOption('--project-id <id>', 'Project identifier')
        .requiredOption('--analysis-id <id>', 'Analysis identifier')
        .action(async (_opts: unknown, command: Command) => {
            const options = parseInput(StatusOptionsSchema, command.optsWithGlobals(), 'status options');
            const session = await openSession(options, ctx);
            const client = await legacyClient(session, ctx);
            const { done, status } = await client.getAnalysisStatus(options.projectId, options.analysisId);
            ctx.stdout(`Analysis ${options.analysisId}: ${status}${done ? '' : ' (not finished)'}`);
            ctx.stdout(`Browse it at: ${client.analysisUrl(options.projectId, options.analysisId)}`);
        });

    program
        .command('check-token')
        .description(`Make sure ${API_TOKEN_ENV} is available, prompting for it when possible.`)
        .action(async () => {
            await resolveApiToken({ env: ctx.env, prompt: ctx.prompt });
            ctx.stdout(`${API_TOKEN_ENV} is set.`);
        });

    return program;
}
