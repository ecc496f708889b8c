// src/types.ts

// A request line that made it through the parser.
// Only the method and the raw (still percent-encoded) target are kept.
export interface HTTPRequest {
    method: string;
    target: string;
}

export type Classification = 'directory' | 'file' | 'not-found';

// Where a request target landed on disk.
export interface ResolvedTarget {
    decodedPath: string;
    location: string;
    classification: Classification;
}

// Represents an HTTP response to be sent.
// The body is fully buffered: files are read whole and listings are small.
export interface HTTPResponse {
    statusCode: number;
    statusMessage: string;
    headers: Map<string, string>;
    body: Buffer;
}

// Output sink shared by the pool, dispatcher and connection handler.
export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export type RequestErrorKind = 'MalformedRequest' | 'UnsupportedMethod' | 'TargetTooLong';

export type RequestErrorStatus = 405 | 414 | 500;

const REQUEST_ERROR_STATUS: Record<RequestErrorKind, RequestErrorStatus> = {
    MalformedRequest: 500,
    UnsupportedMethod: 405,
    TargetTooLong: 414,
};

// Raised by the request parser. Each kind has its own fixed response.
export class RequestError extends Error {
    readonly statusCode: RequestErrorStatus;

    constructor(public readonly kind: RequestErrorKind, message: string) {
        super(message);
        this.name = 'RequestError';
        this.statusCode = REQUEST_ERROR_STATUS[kind];
    }
}

export type ConnectionErrorKind =
    | 'AcceptFailure'
    | 'TimeoutSetupFailure'
    | 'ReceiveFailure'
    | 'ReceiveClosed'
    | 'WriteFailure'
    | 'CloseFailure';

// Per-connection failures. These are logged, never propagated to the pool.
export class ConnectionError extends Error {
    constructor(public readonly kind: ConnectionErrorKind, message: string) {
        super(message);
        this.name = 'ConnectionError';
    }
}

export type StartupErrorKind = 'InvalidArgument' | 'BindFailure' | 'ListenFailure';

// Fatal: the process reports it and exits before serving anything.
export class StartupError extends Error {
    constructor(public readonly kind: StartupErrorKind, message: string) {
        super(message);
        this.name = 'StartupError';
    }
}

// Text that cannot be converted to or from UTF-8 without loss.
export class EncodingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EncodingError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
