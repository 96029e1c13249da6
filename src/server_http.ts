import config from './platform/config.js';
import { logger } from './platform/logger.js';
import { createApiRouter } from './bootstrap.js';
import { HttpServerAdapter } from './features/http_adapter/HttpServerAdapter.js';

const COMPONENT = 'Server';

async function main() {
    console.log('=== MCP Chat Service ===');

    if (!config.openai.apiKey) {
        logger.warn({ kind: 'sys', component: COMPONENT, message: 'OPENAI_API_KEY is not set, hosted provider will be unavailable' });
    }

    const adapter = new HttpServerAdapter(createApiRouter());

    try {
        await adapter.start(config.http.port, config.http.host);
        console.log('Service is running. Press Ctrl+C to stop.');

        process.on('SIGINT', () => {
            console.log('\nStopping service...');
            adapter.stop()
                .then(() => process.exit(0))
                .catch((error) => {
                    logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to stop cleanly', error });
                    process.exit(1);
                });
        });
    } catch (error) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to start service', error });
        process.exit(1);
    }
}

void main();
