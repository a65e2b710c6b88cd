import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './lib/errors';
import { isRecord } from './lib/rpc';

dotenv.config();

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ConfigSchema = z.object({
    host: z.string().min(1, 'host is required'),
    httpPort: positiveInt,
    rpcPort: positiveInt,
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    username: z.string().min(1),
    authCode: z.string().min(1).optional(),
    httpTimeoutMs: positiveInt,
    connectTimeoutMs: positiveInt,
    requestTimeoutMs: positiveInt,
    maxFrameBytes: positiveInt,
    acceptancePollIntervalMs: nonNegativeInt,
    acceptanceMaxAttempts: positiveInt,
    methodEchoIntervalMs: nonNegativeInt,
    methodEchoMaxAttempts: positiveInt,
    filamentSlipPauseSettleMs: nonNegativeInt,
    filamentSlipLoadSettleMs: nonNegativeInt,
    filamentSlipStopSettleMs: nonNegativeInt,
    temperatureSagRecoveryMs: nonNegativeInt,
    verbose: z.boolean()
});

export type ReplicatorConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Omit<ReplicatorConfig, 'host'> = {
    httpPort: 80,
    rpcPort: 9999,
    clientId: 'MakerWare',
    clientSecret: 'secret',
    username: 'Replicator Client',
    httpTimeoutMs: 5000,
    connectTimeoutMs: 10000,
    requestTimeoutMs: 30000,
    maxFrameBytes: 1024 * 1024,
    acceptancePollIntervalMs: 1000,
    acceptanceMaxAttempts: 200,
    methodEchoIntervalMs: 200,
    methodEchoMaxAttempts: 150,
    filamentSlipPauseSettleMs: 7000,
    filamentSlipLoadSettleMs: 7000,
    filamentSlipStopSettleMs: 2000,
    temperatureSagRecoveryMs: 10000,
    verbose: false
};

/** Validates a fully merged configuration object. */
export function parseConfig(input: unknown): ReplicatorConfig {
    const parsed = ConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
    }
    return parsed.data;
}

function numberFrom(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    return Number(value);
}

function booleanFrom(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return value === 'true' || value === '1';
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export async function loadConfig(
    argv: string[] = process.argv,
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
): Promise<ReplicatorConfig> {
    // 1. Parse CLI args first to check for config file override
    const args = yargs(hideBin(argv))
        .option('config', { type: 'string', description: 'Path to config file' })
        .option('host', { type: 'string', description: 'Device host or IP address' })
        .option('http-port', { type: 'number', description: 'Device HTTP port' })
        .option('rpc-port', { type: 'number', description: 'Device JSON-RPC port' })
        .option('client-id', { type: 'string', description: 'Client id presented to the device' })
        .option('client-secret', { type: 'string', description: 'Client secret presented to the device' })
        .option('username', { type: 'string', description: 'Name shown on the device when pairing' })
        .option('auth-code', { type: 'string', description: 'Authorization code from an earlier pairing' })
        .option('request-timeout', { type: 'number', description: 'RPC response timeout (ms)' })
        .option('verbose', { type: 'boolean', description: 'Verbose logging' })
        .help()
        .parseSync();

    // 2. Determine config file path
    let configFilePath = args.config ? path.resolve(cwd, args.config) : undefined;
    if (!configFilePath) {
        const localConfig = path.join(cwd, 'replicator.json');
        const userConfig = path.join(os.homedir(), '.replicator', 'config.json');

        if (await fs.pathExists(localConfig)) {
            configFilePath = localConfig;
        } else if (await fs.pathExists(userConfig)) {
            configFilePath = userConfig;
        }
    }

    // 3. Load File Config
    let fileConfig: Record<string, unknown> = {};
    if (configFilePath) {
        let contents: unknown;
        try {
            contents = await fs.readJson(configFilePath);
        } catch (err) {
            throw new ConfigError(`Failed to read config file at ${configFilePath}`, { cause: err });
        }
        if (!isRecord(contents)) {
            throw new ConfigError(`Config file at ${configFilePath} must contain a JSON object`);
        }
        fileConfig = contents;
    }

    // 4. Merge: Defaults < File < Env < CLI
    const envConfig = withoutUndefined({
        host: env.REPLICATOR_HOST || undefined,
        httpPort: numberFrom(env.REPLICATOR_HTTP_PORT),
        rpcPort: numberFrom(env.REPLICATOR_RPC_PORT),
        clientId: env.REPLICATOR_CLIENT_ID || undefined,
        clientSecret: env.REPLICATOR_CLIENT_SECRET || undefined,
        authCode: env.REPLICATOR_AUTH_CODE || undefined,
        requestTimeoutMs: numberFrom(env.REPLICATOR_REQUEST_TIMEOUT_MS),
        verbose: booleanFrom(env.REPLICATOR_VERBOSE)
    });

    const cliConfig = withoutUndefined({
        host: args.host,
        httpPort: args['http-port'],
        rpcPort: args['rpc-port'],
        clientId: args['client-id'],
        clientSecret: args['client-secret'],
        username: args.username,
        authCode: args['auth-code'],
        requestTimeoutMs: args['request-timeout'],
        verbose: args.verbose
    });

    return parseConfig({
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliConfig
    });
}
