import net from 'net';
import { throwIfCancelled } from './abort';
import {
    CancelledError,
    ConnectError,
    ProtocolError,
    ReplicatorError,
    RequestTimeoutError
} from './errors';
import { DEFAULT_MAX_FRAME_BYTES, JsonFrameReader } from './frame';
import { silentLogger, type Logger } from './logger';
import { buildRequest, encodeRequest, toResponse } from './rpc';
import { type DeviceAddress, type RpcParams, type RpcResponse } from './types';

export type SignalOptions = {
    signal?: AbortSignal;
};

export interface RpcConnection {
    request(method: string, params?: RpcParams, options?: SignalOptions): Promise<RpcResponse>;
    close(): void;
}

export interface Transport {
    open(address: DeviceAddress, options?: SignalOptions): Promise<RpcConnection>;
}

export type TcpTransportOptions = {
    connectTimeoutMs?: number;
    requestTimeoutMs?: number;
    maxFrameBytes?: number;
    logger?: Logger;
};

type ConnectionSettings = {
    requestTimeoutMs: number;
    maxFrameBytes: number;
    logger: Logger;
};

type Waiter = {
    resolve: (response: RpcResponse) => void;
    reject: (error: Error) => void;
};

export class TcpTransport implements Transport {
    private readonly connectTimeoutMs: number;
    private readonly settings: ConnectionSettings;

    constructor(opts?: TcpTransportOptions) {
        this.connectTimeoutMs = opts?.connectTimeoutMs ?? 10000;
        this.settings = {
            requestTimeoutMs: opts?.requestTimeoutMs ?? 30000,
            maxFrameBytes: opts?.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
            logger: opts?.logger ?? silentLogger()
        };
    }

    async open(address: DeviceAddress, options: SignalOptions = {}): Promise<RpcConnection> {
        const { signal } = options;
        throwIfCancelled(signal);
        const target = `${address.host}:${address.port}`;

        return new Promise<RpcConnection>((resolve, reject) => {
            const socket = net.connect({ host: address.host, port: address.port, family: 4 });
            let timer: NodeJS.Timeout | undefined;

            const cleanup = () => {
                clearTimeout(timer);
                socket.off('connect', onConnect);
                socket.off('error', onError);
                signal?.removeEventListener('abort', onAbort);
            };
            const abandon = (error: Error) => {
                cleanup();
                socket.destroy();
                reject(error);
            };
            const onConnect = () => {
                cleanup();
                this.settings.logger.debug({ target }, 'RPC connection open');
                resolve(new TcpConnection(socket, target, this.settings));
            };
            const onError = (err: Error) => {
                abandon(new ConnectError(`Unable to connect to ${target}: ${err.message}`, { cause: err }));
            };
            const onAbort = () => abandon(new CancelledError());

            timer = setTimeout(() => {
                abandon(new ConnectError(`Timed out connecting to ${target} after ${this.connectTimeoutMs}ms`));
            }, this.connectTimeoutMs);
            socket.once('connect', onConnect);
            socket.once('error', onError);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}

/**
 * One authenticated-or-not socket to the device. Requests are half-duplex: a request
 * resolves with the next complete JSON document the device sends.
 */
export class TcpConnection implements RpcConnection {
    private readonly socket: net.Socket;
    private readonly target: string;
    private readonly settings: ConnectionSettings;
    private readonly reader: JsonFrameReader;
    private readonly frames: RpcResponse[] = [];
    private waiter: Waiter | null = null;
    private failure: Error | null = null;
    private busy = false;
    private closed = false;

    constructor(socket: net.Socket, target: string, settings: ConnectionSettings) {
        this.socket = socket;
        this.target = target;
        this.settings = settings;
        this.reader = new JsonFrameReader(settings.maxFrameBytes);

        socket.on('data', (chunk: Buffer) => this.onData(chunk));
        socket.on('error', (err: Error) => {
            this.fail(new ConnectError(`Connection to ${target} failed: ${err.message}`, { cause: err }));
        });
        socket.on('close', () => {
            this.fail(new ConnectError(`Connection to ${target} closed`));
        });
    }

    async request(method: string, params: RpcParams = null, options: SignalOptions = {}): Promise<RpcResponse> {
        if (this.closed) {
            throw new ConnectError(`Connection to ${this.target} is closed`);
        }
        if (this.busy) {
            throw new ProtocolError(`Cannot send ${method}: a request is already in flight`);
        }
        if (this.failure) {
            throw this.failure;
        }
        throwIfCancelled(options.signal);

        const request = buildRequest(method, params);
        this.busy = true;
        try {
            this.settings.logger.debug({ target: this.target, method: request.method }, 'RPC request');
            this.socket.write(encodeRequest(request));
            const response = await this.nextFrame(request.method, options.signal);
            this.settings.logger.debug({ target: this.target, method: request.method }, 'RPC response');
            return response;
        } finally {
            this.busy = false;
        }
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.fail(new ConnectError(`Connection to ${this.target} is closed`));
        this.socket.destroy();
        this.settings.logger.debug({ target: this.target }, 'RPC connection closed');
    }

    private nextFrame(method: string, signal?: AbortSignal): Promise<RpcResponse> {
        const queued = this.frames.shift();
        if (queued) {
            return Promise.resolve(queued);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }

        return new Promise<RpcResponse>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;

            const settle = () => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                this.waiter = null;
            };
            const onAbort = () => {
                // The device may still answer; that reply must not reach the next request.
                this.fail(new CancelledError());
                this.socket.destroy();
            };

            this.waiter = {
                resolve: (response) => {
                    settle();
                    resolve(response);
                },
                reject: (error) => {
                    settle();
                    reject(error);
                }
            };
            timer = setTimeout(() => {
                // A late reply would be taken for the answer to the next request.
                const error = new RequestTimeoutError(
                    `No response to ${method} from ${this.target} within ${this.settings.requestTimeoutMs}ms`
                );
                this.fail(error);
            }, this.settings.requestTimeoutMs);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    private onData(chunk: Buffer): void {
        try {
            for (const document of this.reader.push(chunk)) {
                this.deliver(toResponse(document));
            }
        } catch (err) {
            this.fail(err instanceof ReplicatorError ? err : new ProtocolError('Unreadable data on RPC channel', { cause: err }));
            this.socket.destroy();
        }
    }

    private deliver(response: RpcResponse): void {
        if (this.waiter) {
            this.waiter.resolve(response);
        } else {
            this.frames.push(response);
        }
    }

    private fail(error: Error): void {
        if (this.failure) return;
        this.failure = error;
        this.waiter?.reject(error);
    }
}
