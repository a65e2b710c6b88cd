import { z } from 'zod';
import { ProtocolError } from './errors';
import {
    JSONRPC_VERSION,
    RPC_REQUEST_ID,
    type RpcParams,
    type RpcRequest,
    type RpcResponse
} from './types';

const RpcErrorSchema = z.object({
    code: z.number().optional(),
    message: z.string().optional()
}).passthrough();

export type RpcErrorDetail = {
    code?: number;
    message: string;
};

export function buildRequest(method: string, params: RpcParams = null): RpcRequest {
    const name = method.trim();
    if (!name) {
        throw new ProtocolError('RPC method name must not be empty');
    }
    return {
        jsonrpc: JSONRPC_VERSION,
        id: RPC_REQUEST_ID,
        method: name,
        params
    };
}

/** Compact JSON, newline terminated. `params: null` is kept in the frame. */
export function encodeRequest(request: RpcRequest): string {
    return `${JSON.stringify(request)}\n`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toResponse(document: unknown): RpcResponse {
    if (!isRecord(document)) {
        const received = Array.isArray(document) ? 'an array' : typeof document;
        throw new ProtocolError(`Expected a JSON object from the device, received ${received}`);
    }
    return document;
}

/**
 * The device answers some calls with a frame that carries a `method` field while it is
 * still busy. That frame is not a result: the identical call has to be issued again.
 */
export function isMethodEcho(response: RpcResponse): boolean {
    return response.method !== undefined && response.method !== null;
}

export function rpcErrorOf(response: RpcResponse): RpcErrorDetail | null {
    if (response.error === undefined || response.error === null) {
        return null;
    }
    const parsed = RpcErrorSchema.safeParse(response.error);
    if (!parsed.success) {
        const { error } = response;
        return { message: typeof error === 'string' ? error : JSON.stringify(error) };
    }
    return {
        code: parsed.data.code,
        message: parsed.data.message ?? 'unknown error'
    };
}
