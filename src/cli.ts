#!/usr/bin/env node
import { createProgram } from './commands.js';
import { terminalPrompt } from './credentials.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';

async function main(): Promise<void> {
    const program = createProgram({
        env: process.env,
        prompt: process.stdin.isTTY ? terminalPrompt() : undefined,
        stdout: line => process.stdout.write(`${line}\n`),
    });
    await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
    createLogger('cgi-clinics').error({ err: error }, 'Command failed');
    process.stderr.write(`ERROR: ${describeError(error)}\n`);
    process.exit(1);
});
