import fs from 'fs/promises';

import { InputFileNotFoundError } from './errors.js';

/** Rejects with `InputFileNotFoundError` unless `filePath` names a regular file. */
export async function assertReadableFile(filePath: string): Promise<void> {
    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats?.isFile()) throw new InputFileNotFoundError(filePath);
}
