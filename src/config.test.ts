import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from './config';
import { ConfigError } from './lib/errors';

const argv = (...args: string[]) => ['node', 'replicator', ...args];

describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'replicator-config-'));
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('should apply defaults around the CLI host', async () => {
        const config = await loadConfig(argv('--host', '10.0.0.5'), {}, dir);

        expect(config).toEqual({ ...DEFAULT_CONFIG, host: '10.0.0.5' });
        expect(config.rpcPort).toBe(9999);
        expect(config.acceptanceMaxAttempts).toBe(200);
    });

    it('should merge file < env < CLI', async () => {
        await fs.writeJson(path.join(dir, 'replicator.json'), {
            host: 'file-host',
            rpcPort: 1000,
            methodEchoMaxAttempts: 10
        });

        const config = await loadConfig(
            argv('--rpc-port', '3000'),
            { REPLICATOR_HOST: 'env-host', REPLICATOR_RPC_PORT: '2000', REPLICATOR_VERBOSE: 'true' },
            dir
        );

        expect(config.host).toBe('env-host');
        expect(config.rpcPort).toBe(3000);
        expect(config.methodEchoMaxAttempts).toBe(10);
        expect(config.verbose).toBe(true);
    });

    it('should read an explicit config file relative to the working directory', async () => {
        await fs.writeJson(path.join(dir, 'printer.json'), { host: 'printer.local', authCode: 'auth-code-1' });

        const config = await loadConfig(argv('--config', 'printer.json'), {}, dir);

        expect(config.host).toBe('printer.local');
        expect(config.authCode).toBe('auth-code-1');
    });

    it('should require a host', async () => {
        await expect(loadConfig(argv(), {}, dir)).rejects.toThrow('Invalid configuration: host: Required');
    });

    it('should reject a non-numeric port', async () => {
        await expect(loadConfig(argv('--host', '10.0.0.5'), { REPLICATOR_HTTP_PORT: 'eighty' }, dir))
            .rejects.toBeInstanceOf(ConfigError);
    });

    it('should reject a config file that is not an object', async () => {
        await fs.writeJson(path.join(dir, 'replicator.json'), ['10.0.0.5']);

        await expect(loadConfig(argv(), {}, dir)).rejects.toThrow('must contain a JSON object');
    });
});

describe('parseConfig', () => {
    it('should reject a zero attempt ceiling', () => {
        expect(() => parseConfig({ ...DEFAULT_CONFIG, host: '10.0.0.5', acceptanceMaxAttempts: 0 }))
            .toThrow('acceptanceMaxAttempts');
    });
});
