import { z } from 'zod';
import { sleep as defaultSleep, type Sleep } from './abort';
import {
    AuthError,
    AuthorizationTimeoutError,
    ConnectError,
    HttpError,
    ProtocolError
} from './errors';
import { type DeviceHttpClient } from './http';
import { silentLogger, type Logger } from './logger';
import { poll } from './poll';
import { err, ok, type Result } from './result';
import { isRecord } from './rpc';
import {
    type AccessToken,
    type AuthorizationCode,
    type ClientIdentity,
    type PairingHandle,
    type TokenContext
} from './types';

export const DEFAULT_CLIENT_IDENTITY: Readonly<ClientIdentity> = Object.freeze({
    clientId: 'MakerWare',
    clientSecret: 'secret'
});

const AUTH_PATH = 'auth';

const PairingResponseSchema = z.object({
    code: z.string().optional(),
    answer_code: z.string().min(1)
}).passthrough();

const AnswerResponseSchema = z.object({
    answer: z.string().optional(),
    code: z.string().optional()
}).passthrough();

const TokenResponseSchema = z.object({
    status: z.string().optional(),
    access_token: z.string().optional()
}).passthrough();

type AnswerResponse = z.infer<typeof AnswerResponseSchema>;

export type AccessTokenError = AuthError | ConnectError | HttpError | ProtocolError;

export type TokenAuthorityOptions = {
    http: DeviceHttpClient;
    identity?: ClientIdentity;
    /** Name shown on the device while it asks for pairing consent. */
    username?: string;
    pollIntervalMs?: number;
    maxPollAttempts?: number;
    logger?: Logger;
    sleep?: Sleep;
};

function isTransportFailure(error: unknown): error is AccessTokenError {
    return error instanceof ConnectError || error instanceof HttpError || error instanceof ProtocolError;
}

/**
 * Client side of the device's `/auth` endpoint: pairing, acceptance polling and
 * minting of single-connection access tokens.
 */
export class TokenAuthority {
    private readonly http: DeviceHttpClient;
    private readonly identity: ClientIdentity;
    private readonly username: string;
    private readonly pollIntervalMs: number;
    private readonly maxPollAttempts: number;
    private readonly logger: Logger;
    private readonly sleep: Sleep;

    constructor(opts: TokenAuthorityOptions) {
        this.http = opts.http;
        this.identity = opts.identity ?? DEFAULT_CLIENT_IDENTITY;
        this.username = opts.username ?? 'Replicator Client';
        this.pollIntervalMs = opts.pollIntervalMs ?? 1000;
        this.maxPollAttempts = opts.maxPollAttempts ?? 200;
        this.logger = opts.logger ?? silentLogger();
        this.sleep = opts.sleep ?? defaultSleep;
    }

    /** Any JSON body with a `status` field identifies the device. */
    async probe(signal?: AbortSignal): Promise<boolean> {
        try {
            const body = await this.http.getJson(AUTH_PATH, undefined, signal);
            return isRecord(body) && 'status' in body;
        } catch (error) {
            if (isTransportFailure(error)) {
                this.logger.debug({ err: error }, 'Device probe failed');
                return false;
            }
            throw error;
        }
    }

    async beginAuthorization(signal?: AbortSignal): Promise<PairingHandle> {
        const body = await this.http.getJson(AUTH_PATH, {
            response_type: 'code',
            client_id: this.identity.clientId,
            client_secret: this.identity.clientSecret,
            username: this.username
        }, signal);

        const parsed = PairingResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ProtocolError(`Device returned an invalid pairing response: ${parsed.error.message}`);
        }

        this.logger.info('Pairing requested, confirm on the device');
        return { code: parsed.data.code, answerCode: parsed.data.answer_code };
    }

    /**
     * Waits for the user to confirm pairing on the device. The device never pushes the
     * answer, so it is polled until accepted or the attempt ceiling is reached.
     */
    async pollForAcceptance(handle: PairingHandle, signal?: AbortSignal): Promise<AuthorizationCode> {
        const outcome = await poll({
            action: (attempt) => this.requestAnswer(handle, attempt, signal),
            isDone: (answer) => answer?.answer === 'accepted',
            delayMs: this.pollIntervalMs,
            maxAttempts: this.maxPollAttempts,
            signal,
            sleep: this.sleep
        });

        if (!outcome.done) {
            this.logger.warn({ attempts: outcome.attempts }, 'Pairing was not accepted in time');
            throw new AuthorizationTimeoutError(outcome.attempts);
        }

        const code = outcome.value?.code;
        if (!code) {
            throw new ProtocolError('Device accepted pairing without returning an authorization code');
        }
        this.logger.info({ attempts: outcome.attempts }, 'Pairing accepted');
        return code;
    }

    /**
     * A refusal is an `AuthError` result rather than an exception: tokens are minted per
     * connection, so the next operation simply asks again.
     */
    async mintAccessToken(
        code: AuthorizationCode,
        context: TokenContext = 'jsonrpc',
        signal?: AbortSignal
    ): Promise<Result<AccessToken, AccessTokenError>> {
        let body: unknown;
        try {
            body = await this.http.getJson(AUTH_PATH, {
                response_type: 'token',
                client_id: this.identity.clientId,
                client_secret: this.identity.clientSecret,
                context,
                auth_code: code
            }, signal);
        } catch (error) {
            if (isTransportFailure(error)) {
                return err(error);
            }
            throw error;
        }

        const parsed = TokenResponseSchema.safeParse(body);
        const status = parsed.success ? parsed.data.status : undefined;
        const token = parsed.success ? parsed.data.access_token : undefined;
        if (status !== 'success' || !token) {
            this.logger.warn({ context, status }, 'Device refused to issue an access token');
            return err(new AuthError(`Device refused to issue a ${context} access token (status: ${status ?? 'none'})`));
        }
        return ok({ value: token, context });
    }

    private async requestAnswer(handle: PairingHandle, attempt: number, signal?: AbortSignal): Promise<AnswerResponse | null> {
        let body: unknown;
        try {
            body = await this.http.getJson(AUTH_PATH, {
                response_type: 'answer',
                client_id: this.identity.clientId,
                client_secret: this.identity.clientSecret,
                answer_code: handle.answerCode
            }, signal);
        } catch (error) {
            if (isTransportFailure(error)) {
                this.logger.warn({ attempt, err: error }, 'Pairing poll failed, retrying');
                return null;
            }
            throw error;
        }

        const parsed = AnswerResponseSchema.safeParse(body);
        return parsed.success ? parsed.data : null;
    }
}
