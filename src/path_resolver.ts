// src/path_resolver.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { decodeUtf8 } from './encoding';
import { Classification, ResolvedTarget } from './types';

const PERCENT = 0x25;

function hexValue(byte: number): number {
    if (byte >= 0x30 && byte <= 0x39) return byte - 0x30; // 0-9
    if (byte >= 0x41 && byte <= 0x46) return byte - 0x37; // A-F
    if (byte >= 0x61 && byte <= 0x66) return byte - 0x57; // a-f
    return -1;
}

// Lenient RFC 3986 decoding: `%XX` becomes one byte, anything else
// (including a `%` without two hex digits after it) is copied as is.
export function percentDecode(raw: string): Buffer {
    const input = Buffer.from(raw, 'latin1');
    const output = Buffer.alloc(input.length);
    let written = 0;

    for (let i = 0; i < input.length; ) {
        if (input[i] === PERCENT && i + 2 < input.length) {
            const high = hexValue(input[i + 1]);
            const low = hexValue(input[i + 2]);
            if (high !== -1 && low !== -1) {
                output[written++] = (high << 4) | low;
                i += 3;
                continue;
            }
        }
        output[written++] = input[i++];
    }

    return output.subarray(0, written);
}

export function isWithinRoot(root: string, location: string): boolean {
    const relative = path.relative(root, location);
    if (relative === '') return true;
    return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

async function classify(location: string): Promise<Classification> {
    try {
        const stats = await fs.stat(location);
        if (stats.isDirectory()) return 'directory';
        if (stats.isFile()) return 'file';
        return 'not-found';
    } catch (e) {
        // ENOENT, EACCES, ELOOP, a dangling symlink: all the same to a client.
        return 'not-found';
    }
}

// Maps a raw request target onto the filesystem under `root`.
// Throws EncodingError when the decoded bytes are not valid UTF-8.
export async function resolveTarget(rawTarget: string, root: string): Promise<ResolvedTarget> {
    const decodedPath = decodeUtf8(percentDecode(rawTarget));
    const location = decodedPath === '/' ? root : path.join(root, decodedPath);

    // Parent segments that climb out of the root are treated as absent.
    if (!isWithinRoot(root, location)) {
        return { decodedPath, location, classification: 'not-found' };
    }

    return { decodedPath, location, classification: await classify(location) };
}
