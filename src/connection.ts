// src/connection.ts

import { Socket } from 'net';
import { finished } from 'stream/promises';
import { parseRequestLine } from './http_parser';
import { resolveTarget } from './path_resolver';
import { buildResponse } from './http_handler';
import { FIXED_RESPONSES, writeHttpResponse } from './http_writer';
import { consoleLogger } from './logger';
import { ConnectionError, describeError, EncodingError, HTTPRequest, Logger, RequestError } from './types';

export const K_RECV_BUFFER_LEN = 8192;
export const K_RECV_TIMEOUT_MS = 5000;

export interface ConnectionOptions {
    root: string;
    receiveTimeoutMs?: number;
    receiveBufferSize?: number;
    logger?: Logger;
}

// Waits for the first chunk the peer sends, capped at `maxBytes`.
// An empty buffer means the peer closed without sending anything.
export function receiveOnce(socket: Socket, maxBytes: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        if (socket.destroyed) {
            reject(new ConnectionError('ReceiveFailure', 'Connection was destroyed before the request arrived'));
            return;
        }

        const cleanup = () => {
            socket.off('data', onData);
            socket.off('end', onEnd);
            socket.off('close', onEnd);
            socket.off('error', onError);
            socket.off('timeout', onTimeout);
        };
        const onData = (chunk: Buffer) => {
            cleanup();
            socket.pause();
            resolve(chunk.subarray(0, maxBytes));
        };
        const onEnd = () => {
            cleanup();
            resolve(Buffer.alloc(0));
        };
        const onError = (err: Error) => {
            cleanup();
            reject(new ConnectionError('ReceiveFailure', err.message));
        };
        const onTimeout = () => {
            cleanup();
            reject(new ConnectionError('ReceiveFailure', `No request within ${socket.timeout ?? 0}ms`));
        };

        socket.on('data', onData);
        socket.on('end', onEnd);
        socket.on('close', onEnd);
        socket.on('error', onError);
        socket.on('timeout', onTimeout);
        socket.resume();
    });
}

// Half-closes, waits for the write side to flush, then releases the socket.
async function closeConnection(socket: Socket, peer: string, logger: Logger): Promise<void> {
    try {
        socket.end();
        await finished(socket, { readable: false });
    } catch (e) {
        const err = new ConnectionError('CloseFailure', describeError(e));
        logger.warn(`[${peer}] ${err.kind}: ${err.message}`);
    } finally {
        socket.destroy();
    }
}

async function respond(socket: Socket, payload: Buffer, peer: string, logger: Logger): Promise<void> {
    try {
        await writeHttpResponse(socket, payload);
    } catch (e) {
        const err = new ConnectionError('WriteFailure', describeError(e));
        logger.warn(`[${peer}] ${err.kind}: ${err.message}`);
    }
}

// Runs the pipeline after the request bytes are in hand.
// Never throws: every failure maps to one of the fixed responses.
export async function processRequest(data: Buffer, root: string, peer: string, logger: Logger): Promise<Buffer> {
    let request: HTTPRequest;
    try {
        request = parseRequestLine(data);
    } catch (e) {
        if (e instanceof RequestError) {
            logger.info(`[${peer}] ${e.statusCode} ${e.kind}: ${e.message}`);
            return FIXED_RESPONSES[e.statusCode];
        }
        logger.error(`[${peer}] unexpected parser failure: ${describeError(e)}`);
        return FIXED_RESPONSES[500];
    }

    try {
        const target = await resolveTarget(request.target, root);
        logger.info(`[${peer}] ${request.method} ${target.decodedPath} -> ${target.classification}`);
        return await buildResponse(target, logger);
    } catch (e) {
        if (e instanceof EncodingError) {
            logger.warn(`[${peer}] ${request.method} ${request.target}: ${e.message}`);
        } else {
            logger.error(`[${peer}] unexpected failure serving ${request.target}: ${describeError(e)}`);
        }
        return FIXED_RESPONSES[500];
    }
}

// Owns one accepted connection from the first byte to the final close.
export async function handleConnection(socket: Socket, options: ConnectionOptions): Promise<void> {
    const logger = options.logger ?? consoleLogger;
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    let payload: Buffer | null = null;

    try {
        try {
            socket.setTimeout(options.receiveTimeoutMs ?? K_RECV_TIMEOUT_MS);
        } catch (e) {
            throw new ConnectionError('TimeoutSetupFailure', describeError(e));
        }

        const data = await receiveOnce(socket, options.receiveBufferSize ?? K_RECV_BUFFER_LEN);
        socket.setTimeout(0);
        if (data.length === 0) {
            throw new ConnectionError('ReceiveClosed', 'Peer closed the connection without sending a request');
        }

        payload = await processRequest(data, options.root, peer, logger);
    } catch (e) {
        if (e instanceof ConnectionError) {
            logger.warn(`[${peer}] ${e.kind}: ${e.message}`);
            if (e.kind === 'ReceiveFailure') {
                payload = FIXED_RESPONSES[500];
            }
        } else {
            logger.error(`[${peer}] unexpected connection failure: ${describeError(e)}`);
            payload = FIXED_RESPONSES[500];
        }
    }

    if (payload !== null && !socket.destroyed) {
        await respond(socket, payload, peer, logger);
    }
    await closeConnection(socket, peer, logger);
}
