import { type ReplicatorConfig } from './config';
import { sleep as defaultSleep, type Sleep } from './lib/abort';
import { DeviceAuthorization } from './lib/authorization';
import { DeviceHttpClient } from './lib/http';
import { createLogger, type Logger } from './lib/logger';
import { ReplicatorSession, type SessionConfig } from './lib/session';
import { TokenAuthority } from './lib/token-authority';
import { TcpTransport, type Transport } from './lib/transport';

export type ReplicatorOverrides = {
    transport?: Transport;
    fetch?: typeof fetch;
    logger?: Logger;
    sleep?: Sleep;
};

export type Replicator = {
    config: ReplicatorConfig;
    logger: Logger;
    http: DeviceHttpClient;
    authority: TokenAuthority;
    authorization: DeviceAuthorization;
    session: ReplicatorSession;
};

export function toSessionConfig(config: ReplicatorConfig): SessionConfig {
    return {
        address: { host: config.host, port: config.rpcPort },
        methodEcho: {
            intervalMs: config.methodEchoIntervalMs,
            maxAttempts: config.methodEchoMaxAttempts
        },
        filamentSlip: {
            pauseSettleMs: config.filamentSlipPauseSettleMs,
            loadSettleMs: config.filamentSlipLoadSettleMs,
            stopSettleMs: config.filamentSlipStopSettleMs
        },
        temperatureSag: {
            recoveryMs: config.temperatureSagRecoveryMs
        }
    };
}

/** Wires the HTTP channel, token authority, authorization state and session for one device. */
export function createReplicator(config: ReplicatorConfig, overrides: ReplicatorOverrides = {}): Replicator {
    const logger = overrides.logger ?? createLogger({ verbose: config.verbose });
    const sleep = overrides.sleep ?? defaultSleep;

    const http = new DeviceHttpClient({
        host: config.host,
        port: config.httpPort,
        timeoutMs: config.httpTimeoutMs,
        logger: logger.child({ channel: 'http' }),
        fetch: overrides.fetch
    });

    const authority = new TokenAuthority({
        http,
        identity: { clientId: config.clientId, clientSecret: config.clientSecret },
        username: config.username,
        pollIntervalMs: config.acceptancePollIntervalMs,
        maxPollAttempts: config.acceptanceMaxAttempts,
        logger: logger.child({ component: 'auth' }),
        sleep
    });

    const authorization = new DeviceAuthorization(authority, {
        code: config.authCode,
        logger: logger.child({ component: 'auth' })
    });

    const transport = overrides.transport ?? new TcpTransport({
        connectTimeoutMs: config.connectTimeoutMs,
        requestTimeoutMs: config.requestTimeoutMs,
        maxFrameBytes: config.maxFrameBytes,
        logger: logger.child({ channel: 'rpc' })
    });

    const session = new ReplicatorSession(toSessionConfig(config), {
        transport,
        tokens: authority,
        authorization,
        frames: http,
        logger: logger.child({ component: 'session' }),
        sleep
    });

    return { config, logger, http, authority, authorization, session };
}
