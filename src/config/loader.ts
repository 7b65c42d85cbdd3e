import 'dotenv/config';
import fs, { readFileSync } from 'fs';
import cron from 'node-cron';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { parseDuration, SIGNING_ALGORITHMS } from '../constants/crypto';
import { resolveKemAlgorithm } from '../utils/crypto';
import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';

// ============================================================================
// CONFIGURATION SCHEMA WITH ZOD VALIDATION
// ============================================================================

/** `15m`, `1h`, `7d` … parsed to seconds */
const DurationSchema = z.string().transform((value, ctx) => {
    try {
        return parseDuration(value);
    } catch (error) {
        ctx.issues.push({
            code: 'custom',
            message: error instanceof Error ? error.message : String(error),
            input: value,
        });
        return z.NEVER;
    }
});

const KemAlgorithmSchema = z.string().transform((value, ctx) => {
    try {
        return resolveKemAlgorithm(value);
    } catch {
        ctx.issues.push({
            code: 'custom',
            message: `Unsupported KEM algorithm "${value}"`,
            input: value,
        });
        return z.NEVER;
    }
});

const CronSchema = z
    .string()
    .refine((expression) => cron.validate(expression), {
        message: 'Invalid cron expression',
    });

const ServerConfigSchema = z.object({
    port: z.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    publicUrl: z.url().optional(),
});

const StorageConfigSchema = z.object({
    driver: z.enum(['memory', 'postgres']).default('memory'),
});

const DatabaseConfigSchema = z.object({
    url: z.string().min(1).optional(),
    pool: z
        .object({
            min: z.number().int().min(0).default(2),
            max: z.number().int().min(1).default(10),
        })
        .optional(),
    ssl: z.boolean().default(false),
});

const ClientConfigSchema = z.object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    name: z.string().optional(),
    redirectUris: z.array(z.url()).min(1),
    scopes: z.array(z.string().min(1)).optional(),
});

const UserConfigSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
    email: z.email(),
    name: z.string().min(1),
    givenName: z.string().optional(),
    familyName: z.string().optional(),
    emailVerified: z.boolean().optional(),
});

const OidcConfigSchema = z.object({
    issuer: z.url().default('http://localhost:3000'),
    signingAlgorithm: z.enum(SIGNING_ALGORITHMS).default('ML-DSA-44'),
    idTokenTTL: DurationSchema.default(3600),
    accessTokenTTL: DurationSchema.default(3600),
    authorizationCodeTTL: DurationSchema.default(600),
    sessionCookieName: z.string().min(1).default('pq_oidc_session'),
    clients: z.array(ClientConfigSchema).default([]),
    users: z.array(UserConfigSchema).default([]),
});

const KemTlsConfigSchema = z.object({
    enabled: z.boolean().default(false),
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(1).max(65535).default(4433),
    kemAlgorithm: KemAlgorithmSchema.default('ML-KEM-768'),
    signatureAlgorithm: z.enum(SIGNING_ALGORITHMS).default('ML-DSA-44'),
    serverName: z.string().min(1).default('localhost'),
    handshakeTimeout: DurationSchema.default(10),
});

const CleanupConfigSchema = z.object({
    enabled: z.boolean().default(true),
    schedule: CronSchema.default('*/10 * * * *'),
});

const LoggingConfigSchema = z.object({
    level: z
        .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
        .default('info'),
    format: z.enum(['json', 'pretty']).default('json'),
    redactSensitive: z.boolean().default(true),
});

// Main configuration schema
const ConfigSchema = z
    .object({
        server: ServerConfigSchema.prefault({}),
        storage: StorageConfigSchema.prefault({}),
        database: DatabaseConfigSchema.prefault({}),
        oidc: OidcConfigSchema.prefault({}),
        kemtls: KemTlsConfigSchema.prefault({}),
        cleanup: CleanupConfigSchema.prefault({}),
        logging: LoggingConfigSchema.prefault({}),
    })
    .superRefine((config, ctx) => {
        if (config.storage.driver === 'postgres' && !config.database.url) {
            ctx.addIssue({
                code: 'custom',
                path: ['database', 'url'],
                message: 'Required when storage.driver is "postgres"',
            });
        }
    });

export type AppConfig = z.infer<typeof ConfigSchema>;
export type OidcConfig = AppConfig['oidc'];
export type KemTlsConfig = AppConfig['kemtls'];

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

type EnvKind = 'string' | 'int' | 'boolean';

/** Environment variable → config path. Environment wins over the file. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[], EnvKind]> = [
    ['PORT', ['server', 'port'], 'int'],
    ['HOST', ['server', 'host'], 'string'],
    ['PUBLIC_URL', ['server', 'publicUrl'], 'string'],
    ['STORAGE_DRIVER', ['storage', 'driver'], 'string'],
    ['DATABASE_URL', ['database', 'url'], 'string'],
    ['DATABASE_SSL', ['database', 'ssl'], 'boolean'],
    ['OIDC_ISSUER', ['oidc', 'issuer'], 'string'],
    ['SIGNING_ALGORITHM', ['oidc', 'signingAlgorithm'], 'string'],
    ['ID_TOKEN_TTL', ['oidc', 'idTokenTTL'], 'string'],
    ['ACCESS_TOKEN_TTL', ['oidc', 'accessTokenTTL'], 'string'],
    ['AUTHORIZATION_CODE_TTL', ['oidc', 'authorizationCodeTTL'], 'string'],
    ['KEMTLS_ENABLED', ['kemtls', 'enabled'], 'boolean'],
    ['KEMTLS_PORT', ['kemtls', 'port'], 'int'],
    ['KEMTLS_KEM_ALGORITHM', ['kemtls', 'kemAlgorithm'], 'string'],
    ['CLEANUP_ENABLED', ['cleanup', 'enabled'], 'boolean'],
    ['CLEANUP_SCHEDULE', ['cleanup', 'schedule'], 'string'],
    ['LOG_LEVEL', ['logging', 'level'], 'string'],
    ['LOG_FORMAT', ['logging', 'format'], 'string'],
];

function convertEnvValue(value: string, kind: EnvKind): unknown {
    switch (kind) {
        case 'int':
            return /^\d+$/.test(value) ? parseInt(value, 10) : value;
        case 'boolean':
            return value === 'true' ? true : value === 'false' ? false : value;
        case 'string':
            return value;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(
    target: Record<string, unknown>,
    path: readonly string[],
    value: unknown
): void {
    const [head, ...rest] = path;
    if (head === undefined) return;

    if (rest.length === 0) {
        target[head] = value;
        return;
    }

    const child = target[head];
    const next = isRecord(child) ? child : {};
    target[head] = next;
    setPath(next, rest, value);
}

// ============================================================================
// CONFIGURATION LOADER
// ============================================================================

export interface ConfigLoaderOptions {
    env?: NodeJS.ProcessEnv;
    /** Overrides CONFIG_FILE and auto-detection */
    configPath?: string;
    logger?: Logger;
}

export class ConfigLoader {
    private config: AppConfig | null = null;
    private readonly env: NodeJS.ProcessEnv;
    private readonly configPath: string | undefined;
    private readonly log: Logger;

    constructor(options: ConfigLoaderOptions = {}) {
        this.env = options.env ?? process.env;
        this.configPath = options.configPath;
        this.log = (options.logger ?? defaultLogger).child({ module: 'config' });
    }

    /**
     * Load configuration from multiple sources with priority:
     * 1. Environment variables (highest priority)
     * 2. Config file (YAML/JSON)
     * 3. Default values (lowest priority)
     *
     * @throws Error listing every validation issue
     */
    load(): AppConfig {
        if (this.config) {
            return this.config;
        }

        const configPath =
            this.configPath ?? this.env.CONFIG_FILE ?? this.detectConfigFile();

        const fileConfig = configPath ? this.loadConfigFile(configPath) : {};
        if (configPath) {
            this.log.info({ path: configPath }, 'Loaded configuration file');
        }

        const result = ConfigSchema.safeParse(this.mergeWithEnv(fileConfig));
        if (!result.success) {
            const issues = result.error.issues.map(
                (issue) => `${issue.path.join('.')}: ${issue.message}`
            );
            throw new Error(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, {
                cause: result.error,
            });
        }

        this.config = result.data;
        return this.config;
    }

    /**
     * Auto-detect config file in order of preference
     */
    private detectConfigFile(): string | undefined {
        const candidates = [
            'config.yaml',
            'config.yml',
            'config.json',
            'config/config.yaml',
            'config/config.yml',
            'config/config.json',
        ];

        return candidates.find((file) => fs.existsSync(file));
    }

    /**
     * Load and parse config file (YAML or JSON)
     */
    private loadConfigFile(path: string): Record<string, unknown> {
        const content = readFileSync(path, 'utf-8');

        let parsed: unknown;
        if (path.endsWith('.yaml') || path.endsWith('.yml')) {
            parsed = parseYaml(content);
        } else if (path.endsWith('.json')) {
            parsed = JSON.parse(content);
        } else {
            throw new Error(`Unsupported config file format: ${path}`);
        }

        if (parsed === null || parsed === undefined) {
            return {};
        }
        const interpolated = this.interpolateEnvVars(parsed);
        if (!isRecord(interpolated)) {
            throw new Error(`Config file ${path} must contain a mapping`);
        }
        return interpolated;
    }

    /**
     * Recursively replaces ${VAR_NAME} with the environment value.
     */
    private interpolateEnvVars(value: unknown): unknown {
        if (typeof value === 'string') {
            return value.replace(/\$\{([^}]+)\}/g, (match, name: string) => {
                const resolved = this.env[name];
                if (resolved === undefined) {
                    this.log.warn(
                        { variable: name },
                        'Environment variable not found, keeping placeholder'
                    );
                    return match;
                }
                return resolved;
            });
        }

        if (Array.isArray(value)) {
            return value.map((item) => this.interpolateEnvVars(item));
        }

        if (isRecord(value)) {
            return Object.fromEntries(
                Object.entries(value).map(([key, item]) => [
                    key,
                    this.interpolateEnvVars(item),
                ])
            );
        }

        return value;
    }

    private mergeWithEnv(
        fileConfig: Record<string, unknown>
    ): Record<string, unknown> {
        const merged = structuredClone(fileConfig);
        for (const [variable, path, kind] of ENV_OVERRIDES) {
            const value = this.env[variable];
            if (value !== undefined && value !== '') {
                setPath(merged, path, convertEnvValue(value, kind));
            }
        }
        return merged;
    }

    /**
     * Get current configuration
     */
    get(): AppConfig {
        if (!this.config) {
            throw new Error('Configuration not loaded. Call load() first.');
        }
        return this.config;
    }

    /**
     * Reload configuration
     */
    reload(): AppConfig {
        this.config = null;
        return this.load();
    }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

export const configLoader = new ConfigLoader();

export function getConfig(): AppConfig {
    return configLoader.get();
}
