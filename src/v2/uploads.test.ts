import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sinon from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { V2_BASE, v2Client } from '../__tests__/clients.js';
import { formBody, jsonBody, stubFetch } from '../__tests__/fetchStub.js';
import { InputFileNotFoundError, UnexpectedResponseError, ValidationError } from '../errors.js';

let dir: string;
let vcf: string;

beforeEach(async () => {
    sinon.restore();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinics-upload-'));
    vcf = path.join(dir, 'variants.vcf');
    await fs.writeFile(vcf, '##fileformat=VCFv4.2\n', 'utf-8');
});

afterEach(async () => {
    sinon.restore();
    await fs.rm(dir, { recursive: true, force: true });
});

describe('UploadsApi', () => {
    it('requests a temporary slot for analysis input', async () => {
        const { calls } = stubFetch([{ body: { uuid: 'slot-1', code: 'abc' } }]);

        const slot = await v2Client().uploads.requestTemporalUpload('proj');

        expect(slot).toEqual({ uuid: 'slot-1', code: 'abc' });
        expect(calls[0]?.method).toBe('POST');
        expect(calls[0]?.url).toBe(`${V2_BASE}/project/proj/temporal-upload`);
        expect(jsonBody(calls[0])).toEqual({ type: 'ANALYSIS_INPUT' });
    });

    it('refuses a slot without a code and makes no request', async () => {
        const { stub } = stubFetch([]);

        await expect(v2Client().uploads.uploadToSlot('proj', vcf, { uuid: 'slot-1' })).rejects.toThrow(
            new ValidationError("Invalid upload request: missing 'uuid' or 'code'")
        );
        expect(stub.called).toBe(false);
    });

    it('refuses a missing file before reserving a slot', async () => {
        const { stub } = stubFetch([]);
        const missing = path.join(dir, 'absent.vcf');

        const error = await v2Client().uploads.uploadFile('proj', missing).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(InputFileNotFoundError);
        expect(error).toMatchObject({ message: `File not found: ${missing}` });
        expect(stub.called).toBe(false);
    });

    it('uploads through a fresh slot and returns the file uuid', async () => {
        const { calls } = stubFetch([{ body: { uuid: 'p1', code: 'abc' } }, { body: { uuid: 'f1' } }]);

        const fileUuid = await v2Client().uploads.uploadFile('proj', vcf);

        expect(fileUuid).toBe('f1');
        expect(calls).toHaveLength(2);
        expect(calls[1]?.method).toBe('POST');
        expect(calls[1]?.url).toBe(`${V2_BASE}/public/project/proj/temporal-upload/p1`);
        const form = formBody(calls[1]);
        expect(form.get('type')).toBe('ANALYSIS_INPUT');
        expect(form.get('code')).toBe('abc');
        const file = form.get('file');
        expect(typeof file === 'string' || file === null ? null : file.name).toBe('variants.vcf');
        expect(typeof file === 'string' || file === null ? null : await file.text()).toBe('##fileformat=VCFv4.2\n');
    });

    it('rejects an upload reply without a uuid', async () => {
        stubFetch([{ body: { uuid: 'p1', code: 'abc' } }, { body: { status: 'ok' } }]);

        await expect(v2Client().uploads.uploadFile('proj', vcf)).rejects.toBeInstanceOf(UnexpectedResponseError);
    });
});
