import { loadConfig } from './config';
import { createReplicator } from './replicator';

async function main() {
    const config = await loadConfig();
    const { authority, authorization, logger } = createReplicator(config);

    if (!await authority.probe()) {
        logger.error({ host: config.host }, 'No device answered on the auth endpoint');
        process.exit(1);
    }

    const controller = new AbortController();
    process.on('SIGINT', () => controller.abort());

    try {
        const code = await authorization.pair(controller.signal);
        logger.info('Paired. Pass this code as --auth-code or REPLICATOR_AUTH_CODE:');
        console.log(code);
        process.exit(0);
    } catch (err) {
        logger.error({ err }, 'Pairing failed');
        process.exit(1);
    }
}

main().catch((err) => {
    console.error('Failed to pair:', err);
    process.exit(1);
});
