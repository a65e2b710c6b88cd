import { AuthorizationTimeoutError, NotAuthorizedError } from './errors';
import { silentLogger, type Logger } from './logger';
import { type TokenAuthority } from './token-authority';
import { type AuthorizationCode, type PairingHandle } from './types';

export type AuthorizationState =
    | { status: 'unauthenticated' }
    | { status: 'pairing_requested' }
    | { status: 'awaiting_user_acceptance'; handle: PairingHandle }
    | { status: 'authorized'; code: AuthorizationCode }
    | { status: 'timed_out'; attempts: number };

export interface AuthorizationCodeSource {
    requireCode(): AuthorizationCode;
}

type PairingAuthority = Pick<TokenAuthority, 'beginAuthorization' | 'pollForAcceptance'>;

/**
 * Holds the long-lived authorization code and the pairing flow that produces it.
 * Access tokens are minted from the code elsewhere and never change this state.
 */
export class DeviceAuthorization implements AuthorizationCodeSource {
    private readonly authority: PairingAuthority;
    private readonly logger: Logger;
    private current: AuthorizationState = { status: 'unauthenticated' };

    constructor(authority: PairingAuthority, opts?: { code?: AuthorizationCode; logger?: Logger }) {
        this.authority = authority;
        this.logger = opts?.logger ?? silentLogger();
        if (opts?.code) {
            this.current = { status: 'authorized', code: opts.code };
        }
    }

    get state(): AuthorizationState {
        return this.current;
    }

    get isAuthorized(): boolean {
        return this.current.status === 'authorized';
    }

    get isPairing(): boolean {
        return this.current.status === 'pairing_requested' || this.current.status === 'awaiting_user_acceptance';
    }

    /** Adopts a code obtained by an earlier pairing. */
    restore(code: AuthorizationCode): void {
        if (this.isPairing) {
            throw new Error('Cannot restore an authorization code while pairing is in progress');
        }
        this.current = { status: 'authorized', code };
    }

    /**
     * Runs the pairing flow. Starting over from `authorized` replaces the held code;
     * from `timed_out` it is the required restart.
     */
    async pair(signal?: AbortSignal): Promise<AuthorizationCode> {
        if (this.isPairing) {
            throw new Error('Pairing is already in progress');
        }

        const previous = this.current;
        this.current = { status: 'pairing_requested' };
        try {
            const handle = await this.authority.beginAuthorization(signal);
            this.current = { status: 'awaiting_user_acceptance', handle };

            const code = await this.authority.pollForAcceptance(handle, signal);
            this.current = { status: 'authorized', code };
            return code;
        } catch (error) {
            if (error instanceof AuthorizationTimeoutError) {
                this.current = { status: 'timed_out', attempts: error.attempts };
            } else {
                this.current = previous.status === 'authorized' ? previous : { status: 'unauthenticated' };
            }
            this.logger.warn({ err: error }, 'Pairing failed');
            throw error;
        }
    }

    requireCode(): AuthorizationCode {
        if (this.current.status !== 'authorized') {
            throw new NotAuthorizedError(`No authorization code (state: ${this.current.status}); pair with the device first`);
        }
        return this.current.code;
    }
}
