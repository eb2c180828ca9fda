// src/core/errors/MigrateError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Base error class for all pg-migrate errors.
 * Provides structured metadata and operator-friendly formatting.
 */
export class MigrateError extends Error {
    public readonly context: ErrorContext;
    public readonly timestamp: number;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MigrateError';
        this.context = context;
        this.timestamp = Date.now();

        // Ensure proper stack trace in Node.js
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Converts the error to a plain object for JSON serialization.
     */
    public toJSON() {
        return {
            name: this.name,
            message: this.message,
            timestamp: this.timestamp,
            context: this.context,
            stack: process.env.NODE_ENV === 'development' ? this.stack : undefined
        };
    }

    /**
     * Formats a message suitable for the operator running the migration.
     */
    public toUserFriendly(): string {
        let msg = `[${this.context.code || 'ERROR'}] ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
