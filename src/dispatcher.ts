// src/dispatcher.ts

import * as net from 'net';
import { handleConnection } from './connection';
import { consoleLogger } from './logger';
import { WorkerPool } from './worker_pool';
import { ConnectionError, describeError, Logger, StartupError } from './types';

const BIND_ERROR_CODES = new Set(['EADDRINUSE', 'EADDRNOTAVAIL', 'EACCES']);

export interface DispatcherOptions {
    host: string;
    port: number;
    root: string;
    pool: WorkerPool;
    logger?: Logger;
    receiveTimeoutMs?: number;
    receiveBufferSize?: number;
}

export interface Dispatcher {
    server: net.Server;
    address: net.AddressInfo;
    close(): Promise<void>;
}

function listen(server: net.Server, host: string, port: number): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
            const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
            const kind = BIND_ERROR_CODES.has(code) ? 'BindFailure' : 'ListenFailure';
            reject(new StartupError(kind, `Cannot listen on ${host}:${port}: ${err.message}`));
        };
        server.once('error', onError);
        server.listen({ host, port }, () => {
            server.off('error', onError);
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new StartupError('BindFailure', `Unexpected listen address: ${String(address)}`));
                return;
            }
            resolve(address);
        });
    });
}

// Accepts connections on host:port and hands each one to the pool.
// The accept loop never waits on a connection; only startup failures reject.
export async function serve(options: DispatcherOptions): Promise<Dispatcher> {
    const logger = options.logger ?? consoleLogger;
    const { pool, root } = options;

    // allowHalfOpen: a client that shuts down its send side after the request
    // still gets its response.
    const server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true }, (socket) => {
        // Until a worker picks the socket up, errors only get logged.
        socket.on('error', (err) => {
            logger.warn(`[dispatcher] socket error from ${socket.remoteAddress ?? 'unknown'}: ${err.message}`);
        });

        try {
            pool.submit(() =>
                handleConnection(socket, {
                    root,
                    logger,
                    receiveTimeoutMs: options.receiveTimeoutMs,
                    receiveBufferSize: options.receiveBufferSize,
                }),
            );
        } catch (e) {
            // Only happens while the pool is shutting down.
            logger.warn(`[dispatcher] refusing connection: ${describeError(e)}`);
            socket.destroy();
        }
    });

    const address = await listen(server, options.host, options.port);

    // After listening, server errors come from accept() and are transient.
    server.on('error', (err) => {
        const failure = new ConnectionError('AcceptFailure', err.message);
        logger.error(`[dispatcher] ${failure.kind}: ${failure.message}`);
    });
    // Connections refused at maxConnections never reach the pool.
    server.on('drop', (data) => {
        const failure = new ConnectionError('AcceptFailure', `dropped connection from ${data?.remoteAddress ?? 'unknown'}`);
        logger.error(`[dispatcher] ${failure.kind}: ${failure.message}`);
    });

    logger.info(`Server listening on ${address.address}:${address.port}, serving ${root} with ${pool.size} workers`);

    return {
        server,
        address,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((err) => {
                    if (err) {
                        reject(err);
                    } else {
                        resolve();
                    }
                });
            }),
    };
}
