import { z } from 'zod';
import fs from 'fs/promises';
import _ from 'lodash';

import { ConfigurationError, describeError } from './errors.js';
import { LogLevelSchema } from './logger.js';

// --- Configuration Schema ---

export const V2_DEFAULT_BASE_URL = 'https://v2.cgiclinics.eu/api/1.0';
export const LEGACY_DEFAULT_BASE_URL = 'https://api.cgiclinics.eu';
export const LEGACY_DEFAULT_PLATFORM_URL = 'https://platform.cgiclinics.eu';
export const DEFAULT_TIMEOUT_MS = 20_000;

const V2ConfigSchema = z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
});

const LegacyConfigSchema = z.object({
    baseUrl: z.string().url(),
    platformUrl: z.string().url(), // Browsable web app, used for links printed after a submission
    timeoutMs: z.number().int().positive(),
});

const ConfigSchema = z.object({
    v2: V2ConfigSchema,
    legacy: LegacyConfigSchema,
    logLevel: LogLevelSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type V2Config = z.infer<typeof V2ConfigSchema>;
export type LegacyConfig = z.infer<typeof LegacyConfigSchema>;

const DEFAULTS: AppConfig = {
    v2: { baseUrl: V2_DEFAULT_BASE_URL, timeoutMs: DEFAULT_TIMEOUT_MS },
    legacy: {
        baseUrl: LEGACY_DEFAULT_BASE_URL,
        platformUrl: LEGACY_DEFAULT_PLATFORM_URL,
        timeoutMs: DEFAULT_TIMEOUT_MS,
    },
    logLevel: 'info',
};

// --- Configuration Loading ---

/**
 * Loads the optional JSON config file and fills in defaults.
 * `LOG_LEVEL` in the environment wins over the file's `logLevel`.
 */
export async function loadConfig(
    configPath?: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
    let loadedConfig: unknown = {};
    if (configPath) {
        try {
            const configData = await fs.readFile(configPath, 'utf-8');
            loadedConfig = JSON.parse(configData);
        } catch (error) {
            throw new ConfigurationError(
                `Configuration file not found or invalid: ${configPath} (${describeError(error)})`
            );
        }
    }

    const configWithDefaults = applyDefaults(loadedConfig, env);
    const parsed = ConfigSchema.safeParse(configWithDefaults);
    if (!parsed.success) {
        const details = parsed.error.errors
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Configuration validation failed for ${configPath ?? 'defaults'}: ${details}`);
    }
    return parsed.data;
}

// Merge the loaded file over a fresh copy of the defaults
function applyDefaults(config: unknown, env: NodeJS.ProcessEnv): unknown {
    if (!_.isPlainObject(config)) return config; // let the schema report the wrong shape
    const result: Record<string, unknown> = _.merge(_.cloneDeep(DEFAULTS), config);
    if (env.LOG_LEVEL) {
        result.logLevel = env.LOG_LEVEL;
    }
    return result;
}
