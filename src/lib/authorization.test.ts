import { describe, it, expect } from '@jest/globals';
import { DeviceAuthorization } from './authorization';
import { AuthorizationTimeoutError, ConnectError, NotAuthorizedError } from './errors';
import { type AuthorizationCode, type PairingHandle } from './types';

type FakeAuthority = {
    beginAuthorization: (signal?: AbortSignal) => Promise<PairingHandle>;
    pollForAcceptance: (handle: PairingHandle, signal?: AbortSignal) => Promise<AuthorizationCode>;
};

const handle: PairingHandle = { code: 'PAIR-REQUEST', answerCode: 'ABC123' };

function accepting(code: AuthorizationCode): FakeAuthority {
    return {
        beginAuthorization: async () => handle,
        pollForAcceptance: async () => code
    };
}

describe('DeviceAuthorization', () => {
    it('should start unauthenticated', () => {
        const authorization = new DeviceAuthorization(accepting('auth-1'));

        expect(authorization.state).toEqual({ status: 'unauthenticated' });
        expect(() => authorization.requireCode()).toThrow(NotAuthorizedError);
    });

    it('should start authorized with a known code', () => {
        const authorization = new DeviceAuthorization(accepting('auth-1'), { code: 'known-code' });

        expect(authorization.isAuthorized).toBe(true);
        expect(authorization.requireCode()).toBe('known-code');
    });

    it('should pass through each pairing state', async () => {
        const seen: string[] = [];
        let authorization: DeviceAuthorization | undefined;
        authorization = new DeviceAuthorization({
            beginAuthorization: async () => {
                seen.push(authorization?.state.status ?? 'none');
                return handle;
            },
            pollForAcceptance: async (received) => {
                seen.push(authorization?.state.status ?? 'none');
                expect(received).toBe(handle);
                return 'auth-1';
            }
        });

        await expect(authorization.pair()).resolves.toBe('auth-1');

        expect(seen).toEqual(['pairing_requested', 'awaiting_user_acceptance']);
        expect(authorization.state).toEqual({ status: 'authorized', code: 'auth-1' });
    });

    it('should end timed out and allow a restart', async () => {
        let timeouts = 1;
        const authorization = new DeviceAuthorization({
            beginAuthorization: async () => handle,
            pollForAcceptance: async () => {
                if (timeouts-- > 0) {
                    throw new AuthorizationTimeoutError(200);
                }
                return 'auth-2';
            }
        });

        await expect(authorization.pair()).rejects.toBeInstanceOf(AuthorizationTimeoutError);
        expect(authorization.state).toEqual({ status: 'timed_out', attempts: 200 });
        expect(() => authorization.requireCode()).toThrow(NotAuthorizedError);

        await expect(authorization.pair()).resolves.toBe('auth-2');
        expect(authorization.requireCode()).toBe('auth-2');
    });

    it('should fall back to unauthenticated when pairing cannot start', async () => {
        const authorization = new DeviceAuthorization({
            beginAuthorization: async () => {
                throw new ConnectError('Unable to reach 10.0.0.5');
            },
            pollForAcceptance: async () => 'never'
        });

        await expect(authorization.pair()).rejects.toBeInstanceOf(ConnectError);
        expect(authorization.state).toEqual({ status: 'unauthenticated' });
    });

    it('should keep a working code when re-pairing fails', async () => {
        const authorization = new DeviceAuthorization({
            beginAuthorization: async () => {
                throw new ConnectError('Unable to reach 10.0.0.5');
            },
            pollForAcceptance: async () => 'never'
        }, { code: 'working-code' });

        await expect(authorization.pair()).rejects.toBeInstanceOf(ConnectError);
        expect(authorization.state).toEqual({ status: 'authorized', code: 'working-code' });
        expect(authorization.requireCode()).toBe('working-code');
    });

    it('should refuse a second pairing while one is running', async () => {
        let accept: (code: AuthorizationCode) => void = () => undefined;
        const authorization = new DeviceAuthorization({
            beginAuthorization: async () => handle,
            pollForAcceptance: () => new Promise<AuthorizationCode>(resolve => {
                accept = resolve;
            })
        });

        const first = authorization.pair();
        await expect(authorization.pair()).rejects.toThrow('Pairing is already in progress');
        expect(() => authorization.restore('other')).toThrow('while pairing is in progress');

        await new Promise(resolve => setImmediate(resolve));
        accept('auth-3');
        await expect(first).resolves.toBe('auth-3');
    });

    it('should replace the held code on restore', () => {
        const authorization = new DeviceAuthorization(accepting('auth-1'), { code: 'old-code' });

        authorization.restore('new-code');

        expect(authorization.requireCode()).toBe('new-code');
    });
});
