// src/config/index.ts
/**
 * Runtime configuration, resolved once from environment variables.
 *
 * Environment Variables:
 *   LOG_LEVEL                 - winston level (default: warn)
 *   SOLIDLINT_FORMAT          - default report format: text | json (default: text)
 *   SOLIDLINT_INFER_LAYERS    - treat *Service/*Manager/... types as service-layer (default: false)
 *   SOLIDLINT_PERSISTENCE_SUFFIXES - comma-separated SRP persistence suffixes
 *   SOLIDLINT_MESSAGING_SUFFIXES   - comma-separated SRP messaging suffixes
 */

export type ReportFormat = 'text' | 'json';

export interface SolidlintConfig {
    logLevel: string;
    defaultFormat: ReportFormat;
    inferLayers: boolean;
    /** Dependency-name suffixes per technical category, used by the SRP heuristic */
    technicalSuffixes: Record<string, string[]>;
    /** Type-name suffixes marking a service-layer type when layer inference is on */
    serviceLayerSuffixes: string[];
}

export const DEFAULT_PERSISTENCE_SUFFIXES = ['Repository', 'Repo', 'DAO', 'Dao', 'Connection'];
export const DEFAULT_MESSAGING_SUFFIXES = ['Sender', 'Client', 'Mailer', 'Publisher'];
export const DEFAULT_SERVICE_LAYER_SUFFIXES = ['Service', 'Manager', 'UseCase', 'Interactor', 'Facade'];

function parseList(value: string | undefined, fallback: string[]): string[] {
    if (!value) return fallback;
    const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
    return items.length > 0 ? items : fallback;
}

function parseFormat(value: string | undefined): ReportFormat {
    return value?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

function parseBoolean(value: string | undefined): boolean {
    return value === 'true' || value === '1';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SolidlintConfig {
    return {
        logLevel: env.LOG_LEVEL || 'warn',
        defaultFormat: parseFormat(env.SOLIDLINT_FORMAT),
        inferLayers: parseBoolean(env.SOLIDLINT_INFER_LAYERS),
        technicalSuffixes: {
            persistence: parseList(env.SOLIDLINT_PERSISTENCE_SUFFIXES, DEFAULT_PERSISTENCE_SUFFIXES),
            messaging: parseList(env.SOLIDLINT_MESSAGING_SUFFIXES, DEFAULT_MESSAGING_SUFFIXES),
        },
        serviceLayerSuffixes: DEFAULT_SERVICE_LAYER_SUFFIXES,
    };
}

const config = loadConfig();

export default config;
