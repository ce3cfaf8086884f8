import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sinon from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LEGACY_BASE, PLATFORM, V2_BASE } from './__tests__/clients.js';
import { stubFetch } from './__tests__/fetchStub.js';
import { createProgram, type CliContext } from './commands.js';
import { ConfigurationError, ValidationError } from './errors.js';

let dir: string;
let configPath: string;
let lines: string[];

function context(env: NodeJS.ProcessEnv, prompt?: CliContext['prompt']): CliContext {
    return { env: { LOG_LEVEL: 'silent', ...env }, prompt, stdout: line => lines.push(line) };
}

async function run(ctx: CliContext, args: string[]): Promise<void> {
    const program = createProgram(ctx).exitOverride();
    await program.parseAsync(['--config', configPath, ...args], { from: 'user' });
}

beforeEach(async () => {
    sinon.restore();
    lines = [];
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clinics-cli-'));
    configPath = path.join(dir, 'config.json');
    await fs.writeFile(
        configPath,
        JSON.stringify({
            v2: { baseUrl: V2_BASE },
            legacy: { baseUrl: LEGACY_BASE, platformUrl: PLATFORM },
        }),
        'utf-8'
    );
});

afterEach(async () => {
    sinon.restore();
    await fs.rm(dir, { recursive: true, force: true });
});

describe('check-token', () => {
    it('confirms a token from the environment', async () => {
        await run(context({ CGI_CLINICS_API_TOKEN: 'test-secret' }), ['check-token']);

        expect(lines).toEqual(['CGI_CLINICS_API_TOKEN is set.']);
    });

    it('takes the token from the prompt when the variable is unset', async () => {
        const env: NodeJS.ProcessEnv = {};
        const ctx = context(env, async () => '  test-secret  ');

        await run(ctx, ['check-token']);

        expect(ctx.env.CGI_CLINICS_API_TOKEN).toBe('test-secret');
        expect(lines).toEqual(['CGI_CLINICS_API_TOKEN is set.']);
    });

    it('fails without a token and without a terminal', async () => {
        await expect(run(context({}), ['check-token'])).rejects.toBeInstanceOf(ConfigurationError);
        expect(lines).toEqual([]);
    });
});

describe('submit', () => {
    it('rejects an unknown API flavor before any request', async () => {
        const { stub } = stubFetch([]);
        const args = [
            'submit',
            '--api',
            'bogus',
            '--project-id',
            '7',
            '--patient-key',
            'P1',
            '--sample-key',
            'S1',
            '--sequencing-key',
            'Q1',
            '--sample-source',
            'tissue',
            '--sequencing-type',
            'wes',
            '--calling-germline',
            'cancer_only',
            '--cancer-type',
            'LUAD',
            '--genome-reference',
            'hg38',
            '--alterations',
            path.join(dir, 'calls.vcf'),
        ];

        await expect(run(context({ CGI_USER: 'alice', CGI_TOKEN: 'test-secret' }), args)).rejects.toBeInstanceOf(
            ValidationError
        );
        expect(stub.called).toBe(false);
    });
});

describe('status', () => {
    it('prints the state of an unfinished analysis and its link', async () => {
        const { calls } = stubFetch([{ body: { status: 'waiting' } }]);

        await run(context({ CGI_USER: 'alice', CGI_TOKEN: 'test-secret' }), [
            'status',
            '--project-id',
            '7',
            '--analysis-id',
            '501',
        ]);

        expect(calls[0]?.url).toBe(`${LEGACY_BASE}/projects/7/analysis/501`);
        expect(calls[0]?.headers.access_token).toBe('alice test-secret');
        expect(lines).toEqual([
            'Analysis 501: waiting (not finished)',
            `Browse it at: ${PLATFORM}/analysis?gid=7&aid=501`,
        ]);
    });
});

describe('download', () => {
    it('writes a single result kind to the given file', async () => {
        const { calls } = stubFetch([{ body: '{"mutations":[]}' }]);
        const output = path.join(dir, 'out', 'mutations.json');

        await run(context({ CGI_CLINICS_API_TOKEN: 'test-secret' }), [
            'download',
            '--project',
            'p1',
            '--analysis',
            'a1',
            '--kind',
            'mutations',
            '--output',
            output,
        ]);

        expect(calls[0]?.url).toBe(`${V2_BASE}/project/p1/analysis/a1/result/mutations`);
        expect(await fs.readFile(output, 'utf-8')).toBe('{"mutations":[]}');
        expect(lines).toEqual([output]);
    });

    it('rejects an unknown result kind', async () => {
        const { stub } = stubFetch([]);

        await expect(
            run(context({ CGI_CLINICS_API_TOKEN: 'test-secret' }), [
                'download',
                '--project',
                'p1',
                '--analysis',
                'a1',
                '--kind',
                'reports',
                '--output',
                dir,
            ])
        ).rejects.toThrow(/^Invalid download options: kind: /);
        expect(stub.called).toBe(false);
    });
});
