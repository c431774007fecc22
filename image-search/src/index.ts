import dotenv from 'dotenv';
import express from 'express';
import { createServer } from './api/server';
import { createRuntime, createShutdown } from './bootstrap';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createLogger, setLogLevel } from './utils/logger';

dotenv.config();

const log = createLogger('ImageSearch');

async function main() {
    const config = loadConfig(process.env);
    setLogLevel(config.logLevel);

    // Model handles and stores are built once and shared by every request
    const runtime = await createRuntime(config);
    log.info(`Vector dimension ${runtime.service.dimension}, uploads in ${config.uploadDir}`);

    const app = express();
    createServer(runtime.service, { maxFileSize: config.maxFileSize, apiToken: config.apiToken }, app);

    const server = app.listen(config.port, () => {
        log.info(`Server is running on http://localhost:${config.port}`);
    });

    const shutdown = createShutdown(
        runtime,
        () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
        (code) => process.exit(code),
        log,
    );
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
    log.error(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
});
