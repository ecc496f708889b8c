// src/config.ts

import * as fs from 'fs';
import * as net from 'net';
import * as path from 'path';
import { defaultWorkerCount } from './worker_pool';
import { StartupError } from './types';

export const USAGE = 'Usage: file-responder <port> <root_path>';

export const DEFAULT_HOST = '0.0.0.0';

/**
 * Runtime configuration for the server process.
 */
export interface ServerConfig {
    /** IPv4 address to bind, from FILE_RESPONDER_HOST. */
    host: string;
    port: number;
    /** Absolute path every request target is resolved against. */
    root: string;
    /** Worker pool size, from FILE_RESPONDER_WORKERS. */
    workerCount: number;
}

export function parsePort(raw: string): number {
    if (!/^\d+$/.test(raw)) {
        throw new StartupError('InvalidArgument', `Port must be a number, got "${raw}"`);
    }
    const port = Number.parseInt(raw, 10);
    if (port < 1 || port > 65535) {
        throw new StartupError('InvalidArgument', `Port must be between 1 and 65535, got ${raw}`);
    }
    return port;
}

export function parseRoot(raw: string): string {
    const root = path.resolve(raw);
    let isDirectory = false;
    try {
        isDirectory = fs.statSync(root).isDirectory();
    } catch (e) {
        isDirectory = false;
    }
    if (!isDirectory) {
        throw new StartupError('InvalidArgument', `Root path ${raw} is not a directory`);
    }
    return root;
}

function parseWorkerCount(raw: string | undefined): number {
    if (raw === undefined || raw === '') {
        return defaultWorkerCount();
    }
    const workerCount = Number.parseInt(raw, 10);
    if (!/^\d+$/.test(raw) || workerCount < 1) {
        throw new StartupError('InvalidArgument', `Invalid FILE_RESPONDER_WORKERS value: ${raw}`);
    }
    return workerCount;
}

function parseHost(raw: string | undefined): string {
    const host = raw === undefined || raw === '' ? DEFAULT_HOST : raw;
    if (!net.isIPv4(host)) {
        throw new StartupError('InvalidArgument', `Invalid FILE_RESPONDER_HOST value: ${host}`);
    }
    return host;
}

/**
 * Builds the server configuration from positional arguments and environment.
 *
 * @param args - Positional arguments after the script name: port, then root path.
 * @param env - Environment to read optional settings from.
 * @throws StartupError when an argument or setting is invalid.
 */
export function loadConfig(args: readonly string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
    if (args.length !== 2) {
        throw new StartupError('InvalidArgument', `Expected 2 arguments, got ${args.length}`);
    }
    const [portRaw, rootRaw] = args;

    return {
        host: parseHost(env.FILE_RESPONDER_HOST),
        port: parsePort(portRaw),
        root: parseRoot(rootRaw),
        workerCount: parseWorkerCount(env.FILE_RESPONDER_WORKERS),
    };
}
