export const JSONRPC_VERSION = '2.0';

/** Requests are strictly half-duplex, so every frame carries the same id. */
export const RPC_REQUEST_ID = -1;

export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_RPC_PORT = 9999;

export type DeviceAddress = {
    host: string;
    port: number;
};

export type ClientIdentity = {
    clientId: string;
    clientSecret: string;
};

export type TokenContext = 'jsonrpc' | 'put' | 'camera';

export type AuthorizationCode = string;

export type AccessToken = {
    value: string;
    context: TokenContext;
};

export type PairingHandle = {
    code?: string;
    answerCode: string;
};

export type RpcParams = { [key: string]: unknown } | null;

export type RpcRequest = {
    jsonrpc: typeof JSONRPC_VERSION;
    id: number;
    method: string;
    params: RpcParams;
};

export type RpcResponse = { [key: string]: unknown };

export type CameraFrame = {
    response: RpcResponse;
    url: string;
    image: Buffer;
    base64: string;
};
