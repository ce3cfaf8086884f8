import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_TIMEOUT_MS, LEGACY_DEFAULT_PLATFORM_URL, V2_DEFAULT_BASE_URL, loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

let dir: string;

async function writeConfig(content: string): Promise<string> {
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, content, 'utf-8');
    return file;
}

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinics-config-'));
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
    it('returns the defaults without a file', async () => {
        const config = await loadConfig(undefined, {});
        expect(config).toEqual({
            v2: { baseUrl: V2_DEFAULT_BASE_URL, timeoutMs: DEFAULT_TIMEOUT_MS },
            legacy: {
                baseUrl: 'https://api.cgiclinics.eu',
                platformUrl: LEGACY_DEFAULT_PLATFORM_URL,
                timeoutMs: 20000,
            },
            logLevel: 'info',
        });
    });

    it('merges a partial file over the defaults', async () => {
        const file = await writeConfig(JSON.stringify({ v2: { timeoutMs: 5000 }, logLevel: 'warn' }));

        const config = await loadConfig(file, {});

        expect(config.v2).toEqual({ baseUrl: V2_DEFAULT_BASE_URL, timeoutMs: 5000 });
        expect(config.legacy.timeoutMs).toBe(20000);
        expect(config.logLevel).toBe('warn');
    });

    it('lets LOG_LEVEL override the file', async () => {
        const file = await writeConfig(JSON.stringify({ logLevel: 'warn' }));
        const config = await loadConfig(file, { LOG_LEVEL: 'debug' });
        expect(config.logLevel).toBe('debug');
    });

    it('names a missing file in the error', async () => {
        const missing = path.join(dir, 'absent.json');
        const error = await loadConfig(missing, {}).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error instanceof Error ? error.message : '').toContain(
            `Configuration file not found or invalid: ${missing} (`
        );
    });

    it('rejects malformed JSON', async () => {
        const file = await writeConfig('{ not json');
        await expect(loadConfig(file, {})).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('reports schema violations by path', async () => {
        const file = await writeConfig(JSON.stringify({ v2: { baseUrl: 'not a url' } }));
        const error = await loadConfig(file, {}).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error instanceof Error ? error.message : '').toContain(`Configuration validation failed for ${file}: v2.baseUrl: `);
    });

    it('rejects an unknown log level', async () => {
        await expect(loadConfig(undefined, { LOG_LEVEL: 'loud' })).rejects.toBeInstanceOf(ConfigurationError);
    });
});
