#!/usr/bin/env node
// src/server.ts

import { loadConfig, USAGE } from './config';
import { serve } from './dispatcher';
import { consoleLogger } from './logger';
import { WorkerPool } from './worker_pool';
import { describeError, StartupError } from './types';

// Starts serving and installs the signal handlers. Resolves once listening.
export async function main(args: readonly string[]): Promise<void> {
    const config = loadConfig(args);
    const pool = new WorkerPool({ workerCount: config.workerCount, logger: consoleLogger });
    const dispatcher = await serve({
        host: config.host,
        port: config.port,
        root: config.root,
        pool,
        logger: consoleLogger,
    });
    console.log('To stop the server, press Ctrl+C');

    // --- Graceful Shutdown ---
    let shuttingDown = false;
    const gracefulShutdown = (signal: NodeJS.Signals) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`\nReceived ${signal}. Shutting down gracefully...`);
        dispatcher
            .close()
            .then(() => pool.shutdown())
            .then(() => {
                console.log('Server is closed. Exiting.');
                process.exit(0);
            })
            .catch((err: unknown) => {
                console.error('Shutdown failed:', describeError(err));
                process.exit(1);
            });
    };
    process.on('SIGINT', gracefulShutdown);
    process.on('SIGTERM', gracefulShutdown);
}

if (require.main === module) {
    main(process.argv.slice(2)).catch((err: unknown) => {
        if (err instanceof StartupError && err.kind === 'InvalidArgument') {
            console.error(`${USAGE}\n${err.message}`);
        } else {
            console.error(`Startup failed: ${describeError(err)}`);
        }
        process.exit(1);
    });
}
