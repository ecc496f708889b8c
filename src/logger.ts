// src/logger.ts

import { Logger } from './types';

export const consoleLogger: Logger = {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
};

// For tests and embedders that want the server quiet.
export const silentLogger: Logger = {
    info: () => {},
    warn: () => {},
    error: () => {},
};
