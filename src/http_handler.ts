// src/http_handler.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { decodeUtf8, encodeUtf8 } from './encoding';
import { consoleLogger } from './logger';
import { getMimeType } from './mime';
import { createResponse, FIXED_RESPONSES, HTML_CONTENT_TYPE, serializeResponse, SERVER_NAME } from './http_writer';
import { EncodingError, Logger, ResolvedTarget } from './types';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

// Turns a classified target into the bytes to put on the wire.
export async function buildResponse(target: ResolvedTarget, logger: Logger = consoleLogger): Promise<Buffer> {
    switch (target.classification) {
        case 'file':
            return serveFile(target.location);
        case 'directory':
            return serveDirectory(target, logger);
        case 'not-found':
            return FIXED_RESPONSES[404];
    }
}

// Reads the whole file; a file that vanished or cannot be opened is a 404.
export async function serveFile(location: string): Promise<Buffer> {
    let content: Buffer;
    try {
        content = await fs.readFile(location);
    } catch (e) {
        return FIXED_RESPONSES[404];
    }
    return serializeResponse(createResponse(200, getMimeType(location), content));
}

// Sizes are truncated, never rounded: 2047 bytes is "1 KB".
export function formatFileSize(size: number): string {
    if (size < KB) {
        return `${size} Bytes`;
    } else if (size < MB) {
        return `${Math.floor(size / KB)} KB`;
    } else if (size < GB) {
        return `${Math.floor(size / MB)} MB`;
    }
    return `${Math.floor(size / GB)} GB`;
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function encodeUrlPath(urlPath: string): string {
    return urlPath.split('/').map(encodeURIComponent).join('/');
}

export interface ListingEntry {
    name: string;
    isDirectory: boolean;
    size: number;
}

// Names come from readdir as raw bytes so that a child is stat-ed under its
// real on-disk name, not one with U+FFFD substituted.
async function inspectEntry(dir: string, rawName: Buffer, logger: Logger): Promise<ListingEntry | null> {
    let name: string;
    try {
        name = decodeUtf8(rawName);
    } catch (e) {
        if (!(e instanceof EncodingError)) {
            throw e;
        }
        logger.warn(`[listing] ${dir}: entry 0x${rawName.toString('hex')} left out: ${e.message}`);
        return null;
    }

    try {
        // stat, not lstat: a symlink is listed as whatever it points at.
        const stats = await fs.stat(Buffer.concat([Buffer.from(dir + path.sep), rawName]));
        return { name, isDirectory: stats.isDirectory(), size: stats.size };
    } catch (e) {
        return null;
    }
}

export function renderListing(urlPath: string, entries: ListingEntry[]): string {
    const base = urlPath.endsWith('/') ? urlPath : `${urlPath}/`;
    const encodedBase = encodeUrlPath(base);

    let body = `<html><head><meta charset="utf-8"><title>${escapeHtml(SERVER_NAME)}</title></head>`;
    body += `<body><h1>${escapeHtml(SERVER_NAME)}</h1>`;
    body += `Current dir: ${escapeHtml(urlPath)}<br><br>`;

    for (const entry of entries) {
        const label = escapeHtml(entry.name);
        const href = encodedBase + encodeURIComponent(entry.name);
        if (entry.isDirectory) {
            body += `<a href="${href}/">${label}/</a><br>`;
        } else {
            body += `<a href="${href}">${label}</a>   ${formatFileSize(entry.size)} <br>`;
        }
    }

    body += '</body></html>';
    return body;
}

// Lists immediate children. Entries that cannot be inspected are left out
// rather than failing the listing; an unreadable directory is a 404. A name
// that is not UTF-8 is left out with a warning naming the directory.
export async function serveDirectory(target: ResolvedTarget, logger: Logger = consoleLogger): Promise<Buffer> {
    let names: Buffer[];
    try {
        names = await fs.readdir(target.location, { encoding: 'buffer' });
    } catch (e) {
        return FIXED_RESPONSES[404];
    }

    const inspected = await Promise.all(names.map((name) => inspectEntry(target.location, name, logger)));
    const entries = inspected
        .filter((entry): entry is ListingEntry => entry !== null)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const body = encodeUtf8(renderListing(target.decodedPath, entries));
    return serializeResponse(createResponse(200, HTML_CONTENT_TYPE, body));
}
