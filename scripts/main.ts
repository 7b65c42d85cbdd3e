#!/usr/bin/env node

/**
 * Configuration and provisioning CLI
 *
 * Usage:
 *   npm run config validate                  - Validate configuration
 *   npm run config show                      - Show current config (redacted)
 *   npm run config hash-password <password>  - Print an argon2id hash
 *   npm run config issue-certificate <name>  - Issue a self-signed KEMTLS certificate
 *   npm run config merge base.yaml prod.yaml - Merge two config files
 */

import { readFileSync, writeFileSync } from 'fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { configLoader } from '../src/config/loader';
import { certificateToJSON, KemTlsServerIdentity } from '../src/kemtls';
import { hashPassword } from '../src/utils/crypto';

const command = process.argv[2];
const args = process.argv.slice(3);

const REDACTED = '***REDACTED***';

// ============================================================================
// COMMANDS
// ============================================================================

function validateConfig() {
    console.log('Validating configuration...\n');

    try {
        const config = configLoader.load();

        console.log('Configuration is valid.\n');
        console.log('Summary:');
        console.log(`  - Server: ${config.server.host}:${config.server.port}`);
        console.log(`  - Issuer: ${config.oidc.issuer}`);
        console.log(`  - Signing algorithm: ${config.oidc.signingAlgorithm}`);
        console.log(`  - Storage: ${config.storage.driver}`);
        console.log(
            `  - Registered: ${config.oidc.clients.length} client(s), ${config.oidc.users.length} user(s)`
        );
        console.log(
            `  - KEMTLS: ${config.kemtls.enabled ? `enabled (${config.kemtls.kemAlgorithm}, port ${config.kemtls.port})` : 'disabled'}`
        );
        console.log(
            `  - Cleanup: ${config.cleanup.enabled ? config.cleanup.schedule : 'disabled'}`
        );

        process.exit(0);
    } catch (error) {
        console.error('Configuration validation failed:\n');
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

function showConfig() {
    try {
        const config = configLoader.load();

        const safeConfig = {
            ...config,
            database: {
                ...config.database,
                url: config.database.url?.replace(/:[^:@]+@/, ':***@'),
            },
            oidc: {
                ...config.oidc,
                clients: config.oidc.clients.map((client) => ({
                    ...client,
                    clientSecret: REDACTED,
                })),
                users: config.oidc.users.map((user) => ({
                    ...user,
                    password: REDACTED,
                })),
            },
        };

        console.log(stringifyYaml(safeConfig));
    } catch (error) {
        console.error('Failed to load configuration:', error);
        process.exit(1);
    }
}

async function printPasswordHash() {
    const [password] = args;
    if (!password) {
        console.error('Usage: npm run config hash-password <password>');
        process.exit(1);
    }

    console.log(await hashPassword(password));
}

function issueCertificate() {
    const config = configLoader.load();
    const subject = args[0] ?? config.kemtls.serverName;

    const identity = KemTlsServerIdentity.create({
        subject,
        kemAlgorithm: config.kemtls.kemAlgorithm,
        signatureAlgorithm: config.kemtls.signatureAlgorithm,
    });

    console.log(JSON.stringify(certificateToJSON(identity.certificate), null, 2));
}

function mergeConfigs() {
    const [baseFile, overrideFile] = args;
    if (!baseFile || !overrideFile) {
        console.error(
            'Usage: npm run config merge <base-config> <override-config>'
        );
        process.exit(1);
    }

    console.log(`Merging ${overrideFile} over ${baseFile}...`);

    try {
        const merged = deepMerge(
            parseYaml(readFileSync(baseFile, 'utf-8')),
            parseYaml(readFileSync(overrideFile, 'utf-8'))
        );

        const outputFile = 'config.merged.yaml';
        writeFileSync(outputFile, stringifyYaml(merged));

        console.log(`Merged configuration saved to: ${outputFile}`);
    } catch (error) {
        console.error('Failed to merge configurations:', error);
        process.exit(1);
    }
}

// ============================================================================
// HELPERS
// ============================================================================

function isObject(item: unknown): item is Record<string, unknown> {
    return typeof item === 'object' && item !== null && !Array.isArray(item);
}

export function deepMerge(target: unknown, source: unknown): unknown {
    if (!isObject(target) || !isObject(source)) {
        return source === undefined ? target : source;
    }

    const output: Record<string, unknown> = { ...target };
    for (const [key, value] of Object.entries(source)) {
        output[key] = key in target ? deepMerge(target[key], value) : value;
    }
    return output;
}

// ============================================================================
// CLI ROUTER
// ============================================================================

async function main() {
    switch (command) {
        case 'validate':
            validateConfig();
            break;

        case 'show':
            showConfig();
            break;

        case 'hash-password':
            await printPasswordHash();
            break;

        case 'issue-certificate':
            issueCertificate();
            break;

        case 'merge':
            mergeConfigs();
            break;

        default:
            console.log('Configuration and provisioning CLI\n');
            console.log('Available commands:');
            console.log('  validate           - Validate configuration');
            console.log('  show               - Show current config (redacted)');
            console.log('  hash-password      - Print an argon2id password hash');
            console.log('  issue-certificate  - Issue a self-signed KEMTLS certificate');
            console.log('  merge              - Merge two config files');
            console.log('\nUsage: npm run config <command> [args]');
            process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
});
