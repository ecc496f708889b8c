// src/http_parser.ts

import { HTTPRequest, RequestError } from './types';

export const K_MAX_TARGET_LEN = 1024;

const HEADER_TERMINATOR = '\r\n\r\n';

// Parses the request line out of the bytes of a single receive.
// Headers and body are never looked at; the terminator only has to exist.
export function parseRequestLine(buffer: Buffer): HTTPRequest {
    // latin1 maps every byte to one char, so string offsets are byte offsets.
    const raw = buffer.toString('latin1');

    if (raw.indexOf(HEADER_TERMINATOR) === -1) {
        throw new RequestError('MalformedRequest', 'Missing end of headers');
    }

    const line = raw.substring(0, raw.indexOf('\r\n'));

    const firstSpace = line.indexOf(' ');
    if (firstSpace === -1) {
        throw new RequestError('MalformedRequest', 'Malformed request line');
    }

    const method = line.substring(0, firstSpace);
    if (method.toUpperCase() !== 'GET') {
        throw new RequestError('UnsupportedMethod', `Method not allowed: ${method}`);
    }

    const targetStart = firstSpace + 1;
    const secondSpace = line.indexOf(' ', targetStart);
    if (secondSpace === -1) {
        throw new RequestError('MalformedRequest', 'Malformed request line');
    }

    const target = line.substring(targetStart, secondSpace);
    if (target.length > K_MAX_TARGET_LEN) {
        throw new RequestError('TargetTooLong', `Request target is ${target.length} bytes`);
    }

    return { method, target };
}
