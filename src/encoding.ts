// src/encoding.ts

import { TextDecoder } from 'util';
import { EncodingError } from './types';

// Paths and directory entry names travel as UTF-8 on the wire and in HTML.
// Conversion is strict in both directions: anything that would lose a
// character throws instead of substituting U+FFFD.

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function decodeUtf8(bytes: Uint8Array): string {
    try {
        return utf8Decoder.decode(bytes);
    } catch (e) {
        throw new EncodingError(`invalid UTF-8 sequence in ${bytes.length}-byte input`);
    }
}

export function encodeUtf8(text: string): Buffer {
    if (LONE_SURROGATE.test(text)) {
        throw new EncodingError(`unpaired surrogate in ${JSON.stringify(text)}`);
    }
    return Buffer.from(text, 'utf8');
}
