import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sinon from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LEGACY_BASE, PLATFORM, legacyClient } from '../__tests__/clients.js';
import { jsonBody, stubFetch } from '../__tests__/fetchStub.js';
import { ApiError, ClinicsError, InputFileNotFoundError, UnexpectedResponseError } from '../errors.js';
import { fileNameFromUrl } from './client.js';
import type { SequencingScope } from './types.js';

const scope: SequencingScope = { projectId: '7', patientId: '11', sampleId: '12', sequencingId: '13' };
const SEQUENCING = `${LEGACY_BASE}/projects/7/patients/11/samples/12/sequencings/13`;

let dir: string;

beforeEach(async () => {
    sinon.restore();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinics-legacy-'));
});

afterEach(async () => {
    sinon.restore();
    await fs.rm(dir, { recursive: true, force: true });
});

describe('LegacyClinicsClient records', () => {
    it('authenticates with user and token joined by a space', async () => {
        const { calls } = stubFetch([{ body: { id: 7, name: 'Cohort' } }]);

        const project = await legacyClient().getProject('7');

        expect(project).toEqual({ id: 7, name: 'Cohort' });
        expect(calls[0]?.url).toBe(`${LEGACY_BASE}/projects/7`);
        expect(calls[0]?.headers.access_token).toBe('alice test-secret');
    });

    it('creates patient, sample and sequencing and returns their ids as strings', async () => {
        const { calls } = stubFetch([{ body: { id: 11 } }, { body: { id: 12 } }, { body: { id: 13 } }]);
        const client = legacyClient();

        const patientId = await client.createPatient('7', 'P1');
        const sampleId = await client.createSample('7', patientId, { key: 'S1', source: 'tissue', cancerType: 'LUAD' });
        const sequencingId = await client.createSequencing('7', patientId, sampleId, {
            key: 'Q1',
            type: 'wes',
            callingGermline: 'cancer_only',
        });

        expect([patientId, sampleId, sequencingId]).toEqual(['11', '12', '13']);
        expect(calls.map(c => `${c.method} ${c.url}`)).toEqual([
            `POST ${LEGACY_BASE}/projects/7/patients`,
            `POST ${LEGACY_BASE}/projects/7/patients/11/samples`,
            `POST ${LEGACY_BASE}/projects/7/patients/11/samples/12/sequencing`,
        ]);
        expect(jsonBody(calls[0])).toEqual({ key: 'P1' });
        expect(jsonBody(calls[1])).toEqual({ key: 'S1', source: 'tissue', cancertype: 'LUAD' });
        expect(jsonBody(calls[2])).toEqual({ key: 'Q1', type: 'wes', mut_call_germline: 'cancer_only' });
    });

    it('surfaces the server detail of a rejected creation', async () => {
        stubFetch([{ status: 422, body: '{"detail":"duplicate key"}' }]);

        const error = await legacyClient()
            .createPatient('7', 'P1')
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ status: 422, message: 'Creating patient P1: 422 - {"detail":"duplicate key"}' });
    });

    it('deletes a patient', async () => {
        const { calls } = stubFetch([{ status: 204 }]);

        await legacyClient().deletePatient('7', '11');

        expect(calls[0]?.method).toBe('DELETE');
        expect(calls[0]?.url).toBe(`${LEGACY_BASE}/projects/7/patients/11`);
    });
});

describe('LegacyClinicsClient analyses', () => {
    it('uploads each file to its signed URL and starts the analysis', async () => {
        const file = path.join(dir, 'variants.vcf');
        await fs.writeFile(file, 'chr1\t100', 'utf-8');
        const { calls } = stubFetch([
            { body: { file_id: 99, upload_url: '/uploads/99?sig=x' } },
            { status: 200 },
            { body: { id: 501 } },
        ]);

        const analysisId = await legacyClient().createAnalysis(scope, { files: [file], reference: 'hg38', title: 'run 1' });

        expect(analysisId).toBe('501');
        expect(calls.map(c => `${c.method} ${c.url}`)).toEqual([
            `GET ${SEQUENCING}/upload?extension=vcf`,
            `PUT ${LEGACY_BASE}/uploads/99?sig=x`,
            `POST ${SEQUENCING}/analysis`,
        ]);
        expect(calls[1]?.headers.access_token).toBeUndefined();
        expect(jsonBody(calls[2])).toEqual({ title: 'run 1', reference: 'hg38', file_ids: ['99'] });
    });

    it('checks every file before the first request', async () => {
        const { stub } = stubFetch([]);
        const missing = path.join(dir, 'absent.csv');

        await expect(
            legacyClient().createAnalysis(scope, { files: [missing], reference: 'hg19', title: 't' })
        ).rejects.toBeInstanceOf(InputFileNotFoundError);
        expect(stub.called).toBe(false);
    });

    it('reports whether an analysis is still waiting', async () => {
        stubFetch([{ body: { status: 'waiting' } }, { body: { status: 'done', id: 501 } }]);
        const client = legacyClient();

        expect(await client.getAnalysisStatus('7', '501')).toEqual({ done: false, status: 'waiting' });
        expect(await client.getAnalysisStatus('7', '501')).toEqual({ done: true, status: 'done' });
    });

    it('downloads result files named after their URL', async () => {
        const { calls } = stubFetch([
            { body: { files: [{ name: 'Report', url: 'https://files.test/a/report.pdf?token=x' }] } },
            { body: 'PDF' },
        ]);

        const written = await legacyClient().downloadAnalysis(
            { projectId: '7', sampleId: '12', sequencingId: '13' },
            '501',
            dir
        );

        expect(written).toEqual([path.join(dir, 'report.pdf')]);
        expect(await fs.readFile(path.join(dir, 'report.pdf'), 'utf-8')).toBe('PDF');
        expect(calls[0]?.url).toBe(`${LEGACY_BASE}/projects/7/samples/12/sequencing/13/analysis/501/results`);
        expect(jsonBody(calls[0])).toEqual({ project_id: '7', sample_id: '12', sequencing_id: '13', analysis_id: '501' });
        expect(calls[1]?.url).toBe('https://files.test/a/report.pdf?token=x');
        expect(calls[1]?.headers.access_token).toBeUndefined();
    });

    it('refuses a result name that would leave the output directory', async () => {
        const { calls } = stubFetch([
            { body: { files: [{ name: 'Escape', url: 'https://files.test/a/..%2Fescaped.txt' }] } },
            { body: 'data' },
        ]);
        const outputDir = path.join(dir, 'out');

        await expect(
            legacyClient().downloadAnalysis({ projectId: '7', sampleId: '12', sequencingId: '13' }, '501', outputDir)
        ).rejects.toBeInstanceOf(UnexpectedResponseError);
        expect(calls).toHaveLength(1);
        await expect(fs.stat(path.join(dir, 'escaped.txt'))).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('builds the platform link', () => {
        expect(legacyClient().analysisUrl('7', '501')).toBe(`${PLATFORM}/analysis?gid=7&aid=501`);
    });
});

describe('fileNameFromUrl', () => {
    it('takes the last path segment', () => {
        expect(fileNameFromUrl('https://x.test/a/b/mutations.tsv')).toBe('mutations.tsv');
        expect(fileNameFromUrl('/a/summary%20v2.json?sig=1')).toBe('summary v2.json');
    });

    it('fails on a URL ending in a slash', () => {
        expect(() => fileNameFromUrl('https://x.test/a/')).toThrow('Cannot derive a file name from result URL: https://x.test/a/');
    });

    it('rejects names that decode to a path', () => {
        expect(() => fileNameFromUrl('https://x.test/a/..%2Fescaped.txt')).toThrow(
            'Cannot derive a file name from result URL: https://x.test/a/..%2Fescaped.txt'
        );
        expect(() => fileNameFromUrl('https://x.test/a/dir%5Cfile.txt')).toThrow(UnexpectedResponseError);
        expect(() => fileNameFromUrl('https://x.test/a/%2E%2E')).toThrow(UnexpectedResponseError);
    });

    it('reports a malformed escape as an unexpected response', () => {
        const url = 'https://x.test/a/bad%E0%A4%A.txt';

        expect(() => fileNameFromUrl(url)).toThrow(UnexpectedResponseError);
        expect(() => fileNameFromUrl(url)).toThrow(ClinicsError);
        expect(() => fileNameFromUrl(url)).toThrow(/^Malformed result URL: https:\/\/x\.test\/a\/bad%E0%A4%A\.txt \(/);
    });
});
