import { loadConfig } from './Config.js';
import { LedgerServer } from './Server.js';

async function bootstrap() {
    const config = loadConfig();
    const server = new LedgerServer(config);
    await server.start();

    const shutdown = () => {
        console.log('[LedgerServer] Shutting down...');
        server.close().then(() => process.exit(0), (e) => {
            console.error(e);
            process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch((e) => {
    console.error(e);
    process.exit(1);
});
