import { describe, it, expect } from '@jest/globals';
import { CancelledError, ConnectError, HttpError, ProtocolError } from './errors';
import { DeviceHttpClient } from './http';

function respondWith(body: string, status = 200): { fetch: typeof fetch; urls: string[] } {
    const urls: string[] = [];
    const fake: typeof fetch = async (input) => {
        urls.push(String(input));
        return new Response(body, { status });
    };
    return { fetch: fake, urls };
}

describe('DeviceHttpClient', () => {
    it('should omit the default port and undefined query values', () => {
        const client = new DeviceHttpClient({ host: '10.0.0.5' });

        expect(client.urlFor('/auth', { response_type: 'code', client_id: 'MakerWare', username: undefined }))
            .toBe('http://10.0.0.5/auth?response_type=code&client_id=MakerWare');
        expect(client.urlFor('auth')).toBe('http://10.0.0.5/auth');
    });

    it('should include a non-default port', () => {
        const client = new DeviceHttpClient({ host: 'printer.local', port: 8080 });

        expect(client.urlFor('settings/frame.png')).toBe('http://printer.local:8080/settings/frame.png');
    });

    it('should parse JSON bodies', async () => {
        const { fetch: fakeFetch, urls } = respondWith('{"status":"success","access_token":"t-1"}');
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: fakeFetch });

        await expect(client.getJson('auth', { response_type: 'token' })).resolves.toEqual({
            status: 'success',
            access_token: 't-1'
        });
        expect(urls).toEqual(['http://10.0.0.5/auth?response_type=token']);
    });

    it('should raise HttpError for error statuses', async () => {
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: respondWith('busy', 503).fetch });

        const error = await client.getJson('auth').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpError);
        expect(error).toHaveProperty('status', 503);
    });

    it('should release the body of an error response', async () => {
        const response = new Response('busy', { status: 503 });
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: async () => response });

        await expect(client.getJson('auth')).rejects.toBeInstanceOf(HttpError);
        await expect(response.text()).rejects.toBeInstanceOf(TypeError);
    });

    it('should raise ProtocolError for invalid JSON', async () => {
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: respondWith('<html>').fetch });

        await expect(client.getJson('auth')).rejects.toBeInstanceOf(ProtocolError);
    });

    it('should raise ConnectError when the device is unreachable', async () => {
        const fakeFetch: typeof fetch = async () => {
            throw new TypeError('fetch failed');
        };
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: fakeFetch });

        await expect(client.getJson('auth')).rejects.toThrow('Unable to reach 10.0.0.5: fetch failed');
    });

    it('should time out slow requests', async () => {
        const fakeFetch: typeof fetch = (_input, init) => new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
        const client = new DeviceHttpClient({ host: '10.0.0.5', timeoutMs: 20, fetch: fakeFetch });

        const error = await client.getJson('auth').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConnectError);
        expect(error).toHaveProperty('message', 'GET auth timed out after 20ms');
    });

    it('should not send when already cancelled', async () => {
        const { fetch: fakeFetch, urls } = respondWith('{}');
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: fakeFetch });
        const controller = new AbortController();
        controller.abort();

        await expect(client.getJson('auth', undefined, controller.signal)).rejects.toBeInstanceOf(CancelledError);
        expect(urls).toEqual([]);
    });

    it('should return raw bytes', async () => {
        const fakeFetch: typeof fetch = async () => new Response(new Uint8Array([0x89, 0x50, 0x4e, 0x47]));
        const client = new DeviceHttpClient({ host: '10.0.0.5', fetch: fakeFetch });

        const bytes = await client.getBytes('/settings/frame.png');

        expect([...bytes]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });
});
