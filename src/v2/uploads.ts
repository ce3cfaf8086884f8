import fs from 'fs/promises';
import path from 'path';

import { ValidationError } from '../errors.js';
import { assertReadableFile } from '../files.js';
import type { HttpTransport } from '../http.js';
import type { Logger } from '../logger.js';
import { requireId, segment } from '../validation.js';
import { TemporalUploadSlotSchema, UploadedFileSchema, type TemporalUploadSlot } from './types.js';

const UPLOAD_TYPE = 'ANALYSIS_INPUT';

/**
 * Two-step upload: reserve a temporary slot, then post the file to the
 * public endpoint with the slot's one-time code. Returns the file uuid that
 * analysis creation expects in `inputFiles`.
 */
export class UploadsApi {
    constructor(
        private readonly transport: HttpTransport,
        private readonly log: Logger
    ) {}

    async requestTemporalUpload(projectUuid: string): Promise<TemporalUploadSlot> {
        requireId(projectUuid, 'projectUuid');
        this.log.info(`Requesting temporal upload slot for project: ${projectUuid}`);
        const slot = await this.transport.json(TemporalUploadSlotSchema, {
            method: 'POST',
            path: `/project/${segment(projectUuid)}/temporal-upload`,
            action: 'Failed to request temporal upload',
            json: { type: UPLOAD_TYPE },
        });
        this.log.info('Temporal upload slot granted');
        return slot;
    }

    async uploadToSlot(projectUuid: string, filePath: string, slot: TemporalUploadSlot): Promise<string> {
        const { uuid, code } = slot;
        if (!uuid || !code) {
            throw new ValidationError("Invalid upload request: missing 'uuid' or 'code'");
        }
        requireId(projectUuid, 'projectUuid');
        await assertReadableFile(filePath);

        const bytes = await fs.readFile(filePath);
        const form = new FormData();
        form.append('type', UPLOAD_TYPE);
        form.append('code', code);
        form.append('file', new Blob([bytes]), path.basename(filePath));

        this.log.info(`Uploading file: ${filePath}`);
        const uploaded = await this.transport.json(UploadedFileSchema, {
            method: 'POST',
            path: `/public/project/${segment(projectUuid)}/temporal-upload/${segment(uuid)}`,
            action: 'Failed to upload file',
            form,
        });
        this.log.info(`File uploaded successfully: ${uploaded.uuid}`);
        return uploaded.uuid;
    }

    async uploadFile(projectUuid: string, filePath: string): Promise<string> {
        await assertReadableFile(filePath);
        const slot = await this.requestTemporalUpload(projectUuid);
        return this.uploadToSlot(projectUuid, filePath, slot);
    }
}
