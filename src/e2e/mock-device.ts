import Fastify, { type FastifyInstance } from 'fastify';
import net, { type AddressInfo } from 'net';
import { JsonFrameReader } from '../lib/frame';
import { isRecord } from '../lib/rpc';

type JsonObject = Record<string, unknown>;

/** Builds the device's reply to one RPC call; `call` counts calls of that method from 1. */
export type RpcHandler = (params: unknown, call: number) => JsonObject;

export type MockDeviceOptions = {
    authCode?: string;
    answerCode?: string;
    /** Poll attempt on which the pairing is accepted. Never accepted when unset. */
    acceptOnAttempt?: number;
    handlers?: Record<string, RpcHandler>;
    frame?: Buffer;
    /** Split every RPC reply into writes of this many bytes. */
    chunkSize?: number;
};

export type ReceivedCall = {
    connection: number;
    method: string;
    params: unknown;
};

export function result(value: unknown): JsonObject {
    return { jsonrpc: '2.0', id: -1, result: value };
}

/** Answers with a method echo `times` times, then with `final`. */
export function echoThen(method: string, times: number, final: JsonObject): RpcHandler {
    return (_params, call) => (call <= times ? { jsonrpc: '2.0', method, params: {} } : final);
}

function portOf(address: string | AddressInfo | null): number {
    if (address === null || typeof address === 'string') {
        throw new Error('MockDevice: server is not listening on a TCP port');
    }
    return address.port;
}

/**
 * In-process stand-in for a printer: `/auth` and frame files over HTTP, JSON-RPC over TCP.
 */
export class MockDevice {
    readonly authCode: string;
    readonly answerCode: string;
    readonly issuedTokens: string[] = [];
    readonly calls: ReceivedCall[] = [];
    answerPolls = 0;
    connectionsOpened = 0;
    connectionsClosed = 0;

    private readonly options: MockDeviceOptions;
    private readonly usedTokens = new Set<string>();
    private readonly callCounts = new Map<string, number>();
    private readonly sockets = new Set<net.Socket>();
    private readonly http: FastifyInstance;
    private readonly rpc: net.Server;

    constructor(options: MockDeviceOptions = {}) {
        this.options = options;
        this.authCode = options.authCode ?? 'auth-code-1';
        this.answerCode = options.answerCode ?? 'ABC123';
        this.http = Fastify({ logger: false });
        this.rpc = net.createServer((socket) => this.handleConnection(socket));
        this.registerRoutes();
    }

    get httpPort(): number {
        return portOf(this.http.server.address());
    }

    get rpcPort(): number {
        return portOf(this.rpc.address());
    }

    async start(): Promise<void> {
        await this.http.listen({ port: 0, host: '127.0.0.1' });
        await new Promise<void>((resolve, reject) => {
            this.rpc.once('error', reject);
            this.rpc.listen(0, '127.0.0.1', () => {
                this.rpc.off('error', reject);
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        for (const socket of this.sockets) {
            socket.destroy();
        }
        await new Promise<void>((resolve, reject) => {
            this.rpc.close((err) => (err ? reject(err) : resolve()));
        });
        await this.http.close();
    }

    methodsOn(connection: number): string[] {
        return this.calls.filter(c => c.connection === connection).map(c => c.method);
    }

    private registerRoutes(): void {
        this.http.get<{ Querystring: Record<string, string | undefined> }>('/auth', async (request, reply) => {
            const query = request.query;

            switch (query.response_type) {
                case undefined:
                    return { status: 'ok' };

                case 'code':
                    return { code: 'PAIR-REQUEST', answer_code: this.answerCode };

                case 'answer': {
                    this.answerPolls++;
                    const accepted = query.answer_code === this.answerCode
                        && this.options.acceptOnAttempt !== undefined
                        && this.answerPolls >= this.options.acceptOnAttempt;
                    return accepted ? { answer: 'accepted', code: this.authCode } : { answer: 'pending' };
                }

                case 'token': {
                    if (query.auth_code !== this.authCode || query.client_id !== 'MakerWare' || query.client_secret !== 'secret') {
                        return { status: 'failure' };
                    }
                    const token = `token-${this.issuedTokens.length + 1}`;
                    this.issuedTokens.push(token);
                    return { status: 'success', access_token: token };
                }

                default:
                    return reply.code(400).send({ status: 'error', message: 'unknown response_type' });
            }
        });

        this.http.get('/settings/frame.png', async (_request, reply) => {
            return reply.header('content-type', 'image/png').send(this.options.frame ?? Buffer.alloc(0));
        });
    }

    private handleConnection(socket: net.Socket): void {
        const connection = ++this.connectionsOpened;
        const reader = new JsonFrameReader();
        let authenticated = false;
        this.sockets.add(socket);

        socket.on('data', (chunk: Buffer) => {
            let documents: unknown[];
            try {
                documents = reader.push(chunk);
            } catch (err) {
                console.error('MockDevice: Failed to parse request', err);
                socket.destroy();
                return;
            }

            for (const document of documents) {
                if (!isRecord(document) || typeof document.method !== 'string') {
                    this.send(socket, { jsonrpc: '2.0', id: -1, error: { code: -32600, message: 'invalid request' } });
                    continue;
                }
                const method = document.method;
                const params = document.params;
                this.calls.push({ connection, method, params });

                if (method === 'authenticate') {
                    authenticated = this.acceptToken(params);
                    this.send(socket, authenticated
                        ? result({})
                        : { jsonrpc: '2.0', id: -1, error: { code: -32001, message: 'authentication failed' } });
                    continue;
                }
                if (!authenticated) {
                    this.send(socket, { jsonrpc: '2.0', id: -1, error: { code: -32002, message: 'not authenticated' } });
                    continue;
                }

                const call = (this.callCounts.get(method) ?? 0) + 1;
                this.callCounts.set(method, call);
                const handler = this.options.handlers?.[method];
                this.send(socket, handler ? handler(params, call) : result(null));
            }
        });

        socket.on('error', () => {
            this.sockets.delete(socket);
            socket.destroy();
        });

        socket.on('close', () => {
            this.connectionsClosed++;
            this.sockets.delete(socket);
        });
    }

    /** Tokens are good for one connection only. */
    private acceptToken(params: unknown): boolean {
        if (!isRecord(params) || typeof params.access_token !== 'string') {
            return false;
        }
        const token = params.access_token;
        if (!this.issuedTokens.includes(token) || this.usedTokens.has(token)) {
            return false;
        }
        this.usedTokens.add(token);
        return true;
    }

    private send(socket: net.Socket, reply: JsonObject): void {
        const data = Buffer.from(JSON.stringify(reply));
        const size = this.options.chunkSize;
        if (!size) {
            socket.write(data);
            return;
        }
        for (let offset = 0; offset < data.length; offset += size) {
            socket.write(data.subarray(offset, offset + size));
        }
    }
}
