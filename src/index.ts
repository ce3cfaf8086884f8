export * from './errors.js';
export { loadConfig, type AppConfig, type LegacyConfig, type V2Config } from './config.js';
export {
    API_TOKEN_ENV,
    LEGACY_TOKEN_ENV,
    LEGACY_USER_ENV,
    legacyHeaders,
    resolveApiToken,
    resolveLegacyCredentials,
    terminalPrompt,
    v2Headers,
    type CredentialSource,
    type LegacyCredentials,
    type Prompt,
} from './credentials.js';
export { createLogger, type LogLevel, type Logger } from './logger.js';
export { HttpTransport, buildQueryString, type ApiRequest, type HttpTransportOptions } from './http.js';

export { ClinicsClient, type ClinicsClientOptions } from './v2/client.js';
export { checkAnalysisSource } from './v2/analyses.js';
export { V2SubmissionApi } from './v2/submission.js';
export * from './v2/types.js';

export { LegacyClinicsClient, type LegacyClientOptions, type LegacyAnalysisInput } from './legacy/client.js';
export { LegacySubmissionApi } from './legacy/submission.js';
export * from './legacy/types.js';

export {
    analysisTitle,
    submitAnalysisWorkflow,
    type SubmissionApi,
    type SubmissionRequest,
    type SubmissionResult,
} from './workflow.js';
