import { sleep as defaultSleep, throwIfCancelled, type Sleep } from './abort';
import { type AuthorizationCodeSource } from './authorization';
import {
    AuthError,
    AuthenticationFailedError,
    NotAuthorizedError,
    PollLimitError,
    ProtocolError
} from './errors';
import { silentLogger, type Logger } from './logger';
import { poll } from './poll';
import { type Result } from './result';
import { isMethodEcho, rpcErrorOf } from './rpc';
import { type AccessTokenError } from './token-authority';
import { type RpcConnection, type Transport } from './transport';
import {
    type AccessToken,
    type AuthorizationCode,
    type CameraFrame,
    type DeviceAddress,
    type RpcParams,
    type RpcResponse,
    type TokenContext
} from './types';

/** Where the device writes a captured frame, and where its web server exposes it. */
export const CAMERA_FRAME_DEVICE_PATH = '/home/settings/frame.png';
export const CAMERA_FRAME_PATH = '/settings/frame.png';

export interface AccessTokenIssuer {
    mintAccessToken(
        code: AuthorizationCode,
        context?: TokenContext,
        signal?: AbortSignal
    ): Promise<Result<AccessToken, AccessTokenError>>;
}

export interface FrameFetcher {
    urlFor(path: string): string;
    getBytes(path: string, signal?: AbortSignal): Promise<Buffer>;
}

export type MethodEchoPolicy = {
    intervalMs: number;
    maxAttempts: number;
};

export type FilamentSlipTiming = {
    pauseSettleMs: number;
    loadSettleMs: number;
    stopSettleMs: number;
};

export type TemperatureSagTiming = {
    recoveryMs: number;
};

export type SessionConfig = Readonly<{
    address: Readonly<DeviceAddress>;
    methodEcho: Readonly<MethodEchoPolicy>;
    filamentSlip: Readonly<FilamentSlipTiming>;
    temperatureSag: Readonly<TemperatureSagTiming>;
}>;

export const DEFAULT_METHOD_ECHO_POLICY: Readonly<MethodEchoPolicy> = Object.freeze({
    intervalMs: 200,
    maxAttempts: 150
});

export const DEFAULT_FILAMENT_SLIP_TIMING: Readonly<FilamentSlipTiming> = Object.freeze({
    pauseSettleMs: 7000,
    loadSettleMs: 7000,
    stopSettleMs: 2000
});

export const DEFAULT_TEMPERATURE_SAG_TIMING: Readonly<TemperatureSagTiming> = Object.freeze({
    recoveryMs: 10000
});

export type SessionDependencies = {
    transport: Transport;
    tokens: AccessTokenIssuer;
    authorization: AuthorizationCodeSource;
    frames: FrameFetcher;
    logger?: Logger;
    sleep?: Sleep;
};

export type OperationOptions = {
    signal?: AbortSignal;
};

export type CallOptions = OperationOptions & {
    /** Re-issue the call while the device answers with a method echo. */
    settle?: boolean;
};

export type ToolOptions = OperationOptions & {
    toolIndex?: number;
};

/**
 * Runs device operations. Each operation gets its own connection, authenticated with a
 * freshly minted token, and the connection is closed whatever the outcome.
 */
export class ReplicatorSession {
    private readonly config: SessionConfig;
    private readonly transport: Transport;
    private readonly tokens: AccessTokenIssuer;
    private readonly authorization: AuthorizationCodeSource;
    private readonly frames: FrameFetcher;
    private readonly logger: Logger;
    private readonly sleep: Sleep;

    constructor(config: SessionConfig, deps: SessionDependencies) {
        this.config = Object.freeze({ ...config });
        this.transport = deps.transport;
        this.tokens = deps.tokens;
        this.authorization = deps.authorization;
        this.frames = deps.frames;
        this.logger = deps.logger ?? silentLogger();
        this.sleep = deps.sleep ?? defaultSleep;
    }

    /** Issues a single RPC call on its own authenticated connection. */
    async call(method: string, params: RpcParams = null, options: CallOptions = {}): Promise<RpcResponse> {
        const { signal } = options;
        return this.withConnection(method, signal, (connection) => options.settle
            ? this.settle(connection, method, params, signal)
            : connection.request(method, params, { signal }));
    }

    async loadFilament(options: ToolOptions = {}): Promise<RpcResponse> {
        return this.processThen('load_filament', 'load_filament', { tool_index: options.toolIndex ?? 0 }, options.signal);
    }

    async unloadFilament(options: ToolOptions = {}): Promise<RpcResponse> {
        return this.processThen('unload_filament', 'unload_filament', { tool_index: options.toolIndex ?? 0 }, options.signal);
    }

    async stopFilament(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('process_method', { method: 'stop_filament' }, options);
    }

    async cancel(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('cancel', null, options);
    }

    async attachExtruder(options: OperationOptions & { index?: number } = {}): Promise<RpcResponse> {
        return this.call('load_print_tool', { index: options.index ?? 0 }, { signal: options.signal, settle: true });
    }

    async getExtruderInformation(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('get_tool_usage_stats', null, { signal: options.signal, settle: true });
    }

    async getInformation(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('get_system_information', null, { signal: options.signal, settle: true });
    }

    async getTemperature(options: ToolOptions = {}): Promise<RpcResponse> {
        return this.call('machine_query_command', {
            machine_func: 'get_temperature',
            params: { index: options.toolIndex ?? 0 }
        }, options);
    }

    async preheat(temperature = 180, options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('preheat', { temperature_settings: [temperature] }, { signal: options.signal, settle: true });
    }

    async cool(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('cool', { ignore_tool_errors: false }, { signal: options.signal, settle: true });
    }

    async print(fileUrl: string, options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('external_print', { url: fileUrl, ensure_build_plate_clear: true }, options);
    }

    async printAgain(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('print_again', null, options);
    }

    async acknowledgeError(errorId = -1, options: OperationOptions = {}): Promise<RpcResponse> {
        return this.processThen('acknowledge_error', 'acknowledged', { error_id: errorId }, options.signal);
    }

    async pause(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('process_method', { method: 'suspend' }, options);
    }

    async unpause(options: OperationOptions = {}): Promise<RpcResponse> {
        return this.call('process_method', { method: 'resume' }, options);
    }

    async captureCameraFrame(options: OperationOptions = {}): Promise<CameraFrame> {
        const { signal } = options;
        const response = await this.call('capture_image', { output_file: CAMERA_FRAME_DEVICE_PATH }, { signal });

        const image = await this.frames.getBytes(CAMERA_FRAME_PATH, signal);
        if (image.length === 0) {
            throw new ProtocolError('Device returned an empty camera frame');
        }

        const url = this.frames.urlFor(CAMERA_FRAME_PATH);
        const base64 = image.toString('base64');
        return {
            response: { ...response, params: { url, base64 } },
            url,
            image,
            base64
        };
    }

    /**
     * Pause, reload filament, stop the loader and resume. Waits give the filament
     * time to settle between steps.
     */
    async recoverFilamentSlip(options: OperationOptions & { timing?: Partial<FilamentSlipTiming> } = {}): Promise<RpcResponse> {
        const { signal } = options;
        const timing = { ...this.config.filamentSlip, ...options.timing };
        this.logger.info({ timing }, 'Recovering from filament slip');

        await this.pause({ signal });
        await this.sleep(timing.pauseSettleMs, signal);
        await this.loadFilament({ signal });
        await this.sleep(timing.loadSettleMs, signal);
        await this.stopFilament({ signal });
        await this.sleep(timing.stopSettleMs, signal);
        return this.unpause({ signal });
    }

    async recoverTemperatureSag(options: OperationOptions & { timing?: Partial<TemperatureSagTiming> } = {}): Promise<RpcResponse> {
        const { signal } = options;
        const timing = { ...this.config.temperatureSag, ...options.timing };
        this.logger.info({ timing }, 'Recovering from temperature sag');

        await this.pause({ signal });
        await this.sleep(timing.recoveryMs, signal);
        return this.unpause({ signal });
    }

    /**
     * True when the device still mints tokens for the held code. Unreachable endpoints
     * reject instead of reporting false.
     */
    async isAuthenticated(options: OperationOptions = {}): Promise<boolean> {
        let code: AuthorizationCode;
        try {
            code = this.authorization.requireCode();
        } catch (error) {
            if (error instanceof NotAuthorizedError) {
                return false;
            }
            throw error;
        }

        const token = await this.tokens.mintAccessToken(code, 'jsonrpc', options.signal);
        if (token.ok) {
            return true;
        }
        if (token.error instanceof AuthError) {
            return false;
        }
        throw token.error;
    }

    /** Process-state changes are announced with `process_method` before the command itself. */
    private async processThen(
        processMethod: string,
        method: string,
        params: RpcParams,
        signal?: AbortSignal
    ): Promise<RpcResponse> {
        return this.withConnection(method, signal, async (connection) => {
            await connection.request('process_method', { method: processMethod }, { signal });
            return connection.request(method, params, { signal });
        });
    }

    private async withConnection<T>(
        operation: string,
        signal: AbortSignal | undefined,
        run: (connection: RpcConnection) => Promise<T>
    ): Promise<T> {
        throwIfCancelled(signal);
        const code = this.authorization.requireCode();
        const connection = await this.transport.open(this.config.address, { signal });
        try {
            await this.authenticate(connection, code, signal);
            this.logger.debug({ operation }, 'Connection authenticated');
            return await run(connection);
        } finally {
            connection.close();
        }
    }

    private async authenticate(connection: RpcConnection, code: AuthorizationCode, signal?: AbortSignal): Promise<void> {
        const token = await this.tokens.mintAccessToken(code, 'jsonrpc', signal);
        if (!token.ok) {
            if (token.error instanceof AuthError) {
                throw new AuthenticationFailedError('Could not obtain an access token for the RPC channel', { cause: token.error });
            }
            throw token.error;
        }

        const response = await connection.request('authenticate', { access_token: token.value.value }, { signal });
        const rpcError = rpcErrorOf(response);
        if (rpcError) {
            throw new AuthenticationFailedError(`Device rejected authentication: ${rpcError.message}`);
        }
    }

    private async settle(
        connection: RpcConnection,
        method: string,
        params: RpcParams,
        signal?: AbortSignal
    ): Promise<RpcResponse> {
        const { intervalMs, maxAttempts } = this.config.methodEcho;
        const outcome = await poll({
            action: () => connection.request(method, params, { signal }),
            isDone: (response) => !isMethodEcho(response),
            delayMs: intervalMs,
            maxAttempts,
            signal,
            sleep: this.sleep,
            onRetry: (_response, attempt) => {
                this.logger.debug({ method, attempt }, 'Device still processing, re-issuing call');
            }
        });

        if (!outcome.done) {
            throw new PollLimitError(method, outcome.attempts);
        }
        return outcome.value;
    }
}
