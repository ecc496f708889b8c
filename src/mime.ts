// src/mime.ts

import * as path from 'path';

export const DEFAULT_MIME_TYPE = 'text/plain';

// Fixed for the life of the process; nothing writes to it after load.
export const MIME_TABLE: ReadonlyMap<string, string> = new Map([
    ['.css', 'text/css'],
    ['.gif', 'image/gif'],
    ['.htm', 'text/html'],
    ['.html', 'text/html'],
    ['.jpeg', 'image/jpeg'],
    ['.jpg', 'image/jpeg'],
    ['.ico', 'image/x-icon'],
    ['.js', 'application/javascript'],
    ['.mp4', 'video/mp4'],
    ['.png', 'image/png'],
    ['.svg', 'image/svg+xml'],
    ['.xml', 'text/xml'],
]);

export function getMimeType(filePath: string): string {
    const ext = path.extname(filePath).toLowerCase();
    return MIME_TABLE.get(ext) ?? DEFAULT_MIME_TYPE;
}
