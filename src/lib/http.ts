import { throwIfCancelled, timedSignal } from './abort';
import { CancelledError, ConnectError, HttpError, ProtocolError } from './errors';
import { silentLogger, type Logger } from './logger';
import { DEFAULT_HTTP_PORT } from './types';

export type Query = Record<string, string | number | undefined>;

export type DeviceHttpClientOptions = {
    host: string;
    port?: number;
    timeoutMs?: number;
    logger?: Logger;
    fetch?: typeof fetch;
};

/**
 * Plain HTTP access to the device: the `/auth` endpoint and files it serves.
 * The timeout covers connecting and reading the whole body.
 */
export class DeviceHttpClient {
    private readonly host: string;
    private readonly port: number;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly fetchImpl: typeof fetch;

    constructor(opts: DeviceHttpClientOptions) {
        this.host = opts.host;
        this.port = opts.port ?? DEFAULT_HTTP_PORT;
        this.timeoutMs = opts.timeoutMs ?? 5000;
        this.logger = opts.logger ?? silentLogger();
        this.fetchImpl = opts.fetch ?? fetch;
    }

    urlFor(path: string, query?: Query): string {
        const origin = this.port === DEFAULT_HTTP_PORT ? `http://${this.host}` : `http://${this.host}:${this.port}`;
        const url = `${origin}/${path.replace(/^\/+/, '')}`;
        if (!query) {
            return url;
        }

        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(query)) {
            if (value !== undefined) {
                search.append(key, String(value));
            }
        }
        const qs = search.toString();
        return qs ? `${url}?${qs}` : url;
    }

    async getJson(path: string, query?: Query, signal?: AbortSignal): Promise<unknown> {
        const text = await this.get(path, this.urlFor(path, query), signal, (response) => response.text());
        try {
            return JSON.parse(text);
        } catch (err) {
            throw new ProtocolError(`Device returned invalid JSON for ${path}`, { cause: err });
        }
    }

    async getBytes(path: string, signal?: AbortSignal): Promise<Buffer> {
        const body = await this.get(path, this.urlFor(path), signal, (response) => response.arrayBuffer());
        return Buffer.from(body);
    }

    private async get<T>(
        path: string,
        url: string,
        signal: AbortSignal | undefined,
        read: (response: Response) => Promise<T>
    ): Promise<T> {
        throwIfCancelled(signal);
        const timed = timedSignal(this.timeoutMs, signal);

        // Query strings carry the client secret, so only the path is logged.
        this.logger.debug({ path }, 'HTTP GET');
        try {
            const response = await this.fetchImpl(url, { method: 'GET', signal: timed.signal });
            if (!response.ok) {
                await response.body?.cancel();
                throw new HttpError(response.status, `GET ${path} failed with status ${response.status}`);
            }
            return await read(response);
        } catch (err) {
            if (err instanceof HttpError) {
                throw err;
            }
            if (signal?.aborted) {
                throw new CancelledError();
            }
            if (timed.timedOut()) {
                throw new ConnectError(`GET ${path} timed out after ${this.timeoutMs}ms`, { cause: err });
            }
            const reason = err instanceof Error ? err.message : String(err);
            throw new ConnectError(`Unable to reach ${this.host}: ${reason}`, { cause: err });
        } finally {
            timed.dispose();
        }
    }
}
