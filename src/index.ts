export { loadConfig, parseConfig, DEFAULT_CONFIG, type ReplicatorConfig } from './config';
export { createReplicator, toSessionConfig, type Replicator, type ReplicatorOverrides } from './replicator';
export { sleep, timedSignal, throwIfCancelled, type Sleep } from './lib/abort';
export { DeviceAuthorization, type AuthorizationState, type AuthorizationCodeSource } from './lib/authorization';
export * from './lib/errors';
export { JsonFrameReader, DEFAULT_MAX_FRAME_BYTES } from './lib/frame';
export { DeviceHttpClient, type DeviceHttpClientOptions, type Query } from './lib/http';
export { createLogger, silentLogger, type Logger } from './lib/logger';
export { poll, type PollOptions, type PollOutcome } from './lib/poll';
export { ok, err, type Result } from './lib/result';
export { buildRequest, encodeRequest, isMethodEcho, rpcErrorOf, toResponse } from './lib/rpc';
export {
    ReplicatorSession,
    CAMERA_FRAME_PATH,
    CAMERA_FRAME_DEVICE_PATH,
    DEFAULT_METHOD_ECHO_POLICY,
    DEFAULT_FILAMENT_SLIP_TIMING,
    DEFAULT_TEMPERATURE_SAG_TIMING,
    type AccessTokenIssuer,
    type FrameFetcher,
    type SessionConfig,
    type SessionDependencies,
    type OperationOptions,
    type CallOptions,
    type ToolOptions,
    type MethodEchoPolicy,
    type FilamentSlipTiming,
    type TemperatureSagTiming
} from './lib/session';
export { TokenAuthority, DEFAULT_CLIENT_IDENTITY, type AccessTokenError, type TokenAuthorityOptions } from './lib/token-authority';
export { TcpTransport, TcpConnection, type Transport, type RpcConnection, type TcpTransportOptions } from './lib/transport';
export * from './lib/types';
