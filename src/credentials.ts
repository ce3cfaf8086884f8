import { createInterface } from 'node:readline/promises';

import { ConfigurationError } from './errors.js';

export const API_TOKEN_ENV = 'CGI_CLINICS_API_TOKEN';
export const LEGACY_USER_ENV = 'CGI_USER';
export const LEGACY_TOKEN_ENV = 'CGI_TOKEN';

/** Asks the user a question and resolves with the raw answer. */
export type Prompt = (question: string) => Promise<string>;

export interface CredentialSource {
    env?: NodeJS.ProcessEnv;
    /** Interactive fallback; without one a missing variable is fatal. */
    prompt?: Prompt;
}

export type AuthHeaders = Record<string, string>;

export interface LegacyCredentials {
    user: string;
    token: string;
}

/**
 * Reads a variable, falling back to the prompt. An answer is written back into
 * `env` so later lookups in the same run find it. Nothing is stored on disk.
 */
async function resolveVariable(name: string, what: string, source: CredentialSource): Promise<string> {
    const env = source.env ?? process.env;
    const value = env[name] ?? '';
    if (value !== '') return value;

    if (source.prompt) {
        const answer = (await source.prompt(`${name} environment variable is not set. Please enter the ${what}: `)).trim();
        if (answer !== '') {
            env[name] = answer;
            return answer;
        }
    }
    throw new ConfigurationError(`${name} environment variable is not set.`);
}

export function resolveApiToken(source: CredentialSource = {}): Promise<string> {
    return resolveVariable(API_TOKEN_ENV, 'token', source);
}

export async function resolveLegacyCredentials(source: CredentialSource = {}): Promise<LegacyCredentials> {
    const user = await resolveVariable(LEGACY_USER_ENV, 'user', source);
    const token = await resolveVariable(LEGACY_TOKEN_ENV, 'token', source);
    return { user, token };
}

export function v2Headers(token: string): AuthHeaders {
    return { access_token: token };
}

export function legacyHeaders(credentials: LegacyCredentials): AuthHeaders {
    return { access_token: `${credentials.user} ${credentials.token}` };
}

/** Prompt on the terminal; the question goes to stderr to keep stdout clean. */
export function terminalPrompt(): Prompt {
    return async (question: string) => {
        const rl = createInterface({ input: process.stdin, output: process.stderr });
        try {
            return await rl.question(question);
        } finally {
            rl.close();
        }
    };
}
