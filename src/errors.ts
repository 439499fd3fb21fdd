// src/errors.ts

export class ExtractionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExtractionError';
    }
}

export class EnrichmentError extends Error {
    constructor(cause: unknown) {
        super('Failed to generate receipt insights', { cause });
        this.name = 'EnrichmentError';
    }
}

export class PersistenceError extends Error {
    constructor(cause: unknown) {
        super('Failed to append the receipt to the spreadsheet', { cause });
        this.name = 'PersistenceError';
    }
}

export class NotificationError extends Error {
    constructor(chatId: string, cause: unknown) {
        super(`Failed to send a message to chat ${chatId}`, { cause });
        this.name = 'NotificationError';
    }
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.cause === undefined ? error.message : `${error.message}: ${describeError(error.cause)}`;
    }
    return String(error);
}
