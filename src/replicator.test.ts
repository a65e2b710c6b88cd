import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG, parseConfig } from './config';
import { silentLogger } from './lib/logger';
import { createReplicator, toSessionConfig } from './replicator';

describe('createReplicator', () => {
    const config = parseConfig({ ...DEFAULT_CONFIG, host: '10.0.0.5', httpPort: 8080 });

    it('should map configuration onto the session', () => {
        expect(toSessionConfig(config)).toEqual({
            address: { host: '10.0.0.5', port: 9999 },
            methodEcho: { intervalMs: 200, maxAttempts: 150 },
            filamentSlip: { pauseSettleMs: 7000, loadSettleMs: 7000, stopSettleMs: 2000 },
            temperatureSag: { recoveryMs: 10000 }
        });
    });

    it('should start unpaired without an auth code', () => {
        const replicator = createReplicator(config, { logger: silentLogger() });

        expect(replicator.authorization.state).toEqual({ status: 'unauthenticated' });
        expect(replicator.http.urlFor('auth')).toBe('http://10.0.0.5:8080/auth');
    });

    it('should adopt a configured auth code', () => {
        const replicator = createReplicator({ ...config, authCode: 'auth-code-1' }, { logger: silentLogger() });

        expect(replicator.authorization.requireCode()).toBe('auth-code-1');
    });
});
