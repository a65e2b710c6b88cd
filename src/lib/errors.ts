export type ReplicatorErrorKind =
    | 'config'
    | 'connect'
    | 'http'
    | 'protocol'
    | 'timeout'
    | 'authorization_timeout'
    | 'not_authorized'
    | 'auth'
    | 'authentication_failed'
    | 'poll_limit'
    | 'cancelled';

export abstract class ReplicatorError extends Error {
    abstract readonly kind: ReplicatorErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends ReplicatorError {
    readonly kind = 'config';
}

/** Socket or HTTP endpoint unreachable, or the connection dropped. */
export class ConnectError extends ReplicatorError {
    readonly kind = 'connect';
}

export class HttpError extends ReplicatorError {
    readonly kind = 'http';
    readonly status: number;

    constructor(status: number, message: string, options?: ErrorOptions) {
        super(message, options);
        this.status = status;
    }
}

/** Malformed or unexpected data from the device. */
export class ProtocolError extends ReplicatorError {
    readonly kind = 'protocol';
}

export class RequestTimeoutError extends ReplicatorError {
    readonly kind = 'timeout';
}

/** The pairing request was not accepted on the device before the attempt ceiling. */
export class AuthorizationTimeoutError extends ReplicatorError {
    readonly kind = 'authorization_timeout';
    readonly attempts: number;

    constructor(attempts: number, options?: ErrorOptions) {
        super(`Pairing was not accepted on the device after ${attempts} attempts`, options);
        this.attempts = attempts;
    }
}

export class NotAuthorizedError extends ReplicatorError {
    readonly kind = 'not_authorized';
}

/** The device refused to mint an access token. */
export class AuthError extends ReplicatorError {
    readonly kind = 'auth';
}

/** Authentication of an RPC connection failed, either at token minting or on the socket. */
export class AuthenticationFailedError extends ReplicatorError {
    readonly kind = 'authentication_failed';
}

export class PollLimitError extends ReplicatorError {
    readonly kind = 'poll_limit';
    readonly method: string;
    readonly attempts: number;

    constructor(method: string, attempts: number, options?: ErrorOptions) {
        super(`Device was still processing ${method} after ${attempts} attempts`, options);
        this.method = method;
        this.attempts = attempts;
    }
}

export class CancelledError extends ReplicatorError {
    readonly kind = 'cancelled';

    constructor(message = 'Operation cancelled', options?: ErrorOptions) {
        super(message, options);
    }
}

export type AnyReplicatorError =
    | ConfigError
    | ConnectError
    | HttpError
    | ProtocolError
    | RequestTimeoutError
    | AuthorizationTimeoutError
    | NotAuthorizedError
    | AuthError
    | AuthenticationFailedError
    | PollLimitError
    | CancelledError;

export function isReplicatorError(value: unknown): value is AnyReplicatorError {
    return value instanceof ReplicatorError;
}
