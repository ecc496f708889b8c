// src/http_writer.ts

import { Socket } from 'net';
import { STATUS_CODES } from 'http';
import { HTTPResponse } from './types';

export const SERVER_NAME = 'file-responder';

export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

function statusMessageFor(statusCode: number): string {
    return STATUS_CODES[statusCode] || 'Unknown Status';
}

// Every response closes the connection and carries an exact Content-Length.
// No Date header: identical requests for unchanged files yield identical bytes.
export function createResponse(statusCode: number, contentType: string, body: Buffer): HTTPResponse {
    return {
        statusCode,
        statusMessage: statusMessageFor(statusCode),
        headers: new Map([
            ['Server', SERVER_NAME],
            ['Connection', 'close'],
            ['Content-Type', contentType],
            ['Content-Length', body.length.toString()],
        ]),
        body,
    };
}

export function serializeResponse(response: HTTPResponse): Buffer {
    const headerLines: string[] = [];
    headerLines.push(`HTTP/1.1 ${response.statusCode} ${response.statusMessage}`);

    for (const [key, value] of response.headers.entries()) {
        headerLines.push(`${key}: ${value}`);
    }

    const headerString = headerLines.join('\r\n') + '\r\n\r\n';
    return Buffer.concat([Buffer.from(headerString, 'latin1'), response.body]);
}

export type FixedStatus = 404 | 405 | 414 | 500;

function buildFixedResponse(statusCode: FixedStatus): Buffer {
    const body = Buffer.from(`<html>${statusCode} ${statusMessageFor(statusCode)}</html>`, 'utf8');
    return serializeResponse(createResponse(statusCode, HTML_CONTENT_TYPE, body));
}

// Built once at load and written verbatim for every occurrence.
export const FIXED_RESPONSES: Readonly<Record<FixedStatus, Buffer>> = Object.freeze({
    404: buildFixedResponse(404),
    405: buildFixedResponse(405),
    414: buildFixedResponse(414),
    500: buildFixedResponse(500),
});

// Resolves once the bytes are handed to the kernel, rejects on a socket error.
export function writeHttpResponse(socket: Socket, payload: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        socket.write(payload, (err) => {
            if (err) {
                reject(err);
            } else {
                resolve();
            }
        });
    });
}
