// src/core/errors/errors.ts

import { MigrateError } from './MigrateError';
import { ErrorContext } from './ErrorContext';

function messageOf(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}

/**
 * Thrown by a step whose perform had an observable side effect before failing.
 * The executor pushes that step onto the compensation stack before the failure propagates.
 */
export class NeedsCompensationError extends MigrateError {
    constructor(cause: unknown, context: ErrorContext = {}) {
        super(messageOf(cause), {
            code: 'NEEDS_COMPENSATION',
            component: 'CORE_SAGA',
            ...context
        }, { cause });
        this.name = 'NeedsCompensationError';
    }
}

/**
 * Thrown when the migration cannot proceed for a reason that is not a crash
 * (missing source database, reported transfer error). The run stops and unwinds quietly.
 */
export class AbortCleanlyError extends MigrateError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'ABORTED',
            component: 'CORE_SAGA',
            ...context
        });
        this.name = 'AbortCleanlyError';
    }
}

/**
 * Thrown when the operator interrupts a run before the unwind has started.
 */
export class CancellationError extends MigrateError {
    constructor(message: string = 'Migration interrupted', context: ErrorContext = {}) {
        super(message, {
            code: 'CANCELLED',
            component: 'CORE_SAGA',
            retryable: true,
            ...context
        });
        this.name = 'CancellationError';
    }
}

/**
 * Thrown when input or configuration validation fails.
 */
export class ValidationError extends MigrateError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'CORE_VALIDATION',
            ...context
        });
        this.name = 'ValidationError';
    }
}

/**
 * Thrown when a forward payload or remote resource a step depends on is absent.
 */
export class NotFoundError extends MigrateError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'NOT_FOUND',
            component: 'APPLICATION',
            ...context
        });
        this.name = 'NotFoundError';
    }
}

/**
 * Thrown when an external API (control plane, transfer service) fails
 * or answers with an unexpected payload.
 */
export class ExternalServiceError extends MigrateError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'SERVICE_ERROR',
            component: 'INFRA_EXTERNAL',
            ...context
        });
        this.name = 'ExternalServiceError';
    }
}

/**
 * Non-2xx answer from the control plane or transfer service.
 */
export class PlatformApiError extends ExternalServiceError {
    public readonly status: number;

    constructor(status: number, message: string, context: ErrorContext = {}) {
        super(message, {
            code: `HTTP_${status}`,
            retryable: status >= 500,
            ...context
        });
        this.name = 'PlatformApiError';
        this.status = status;
    }
}

/**
 * Thrown when a second run is started on an executor that is already engaged.
 */
export class ConcurrencyError extends MigrateError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'CONCURRENCY_ERROR',
            component: 'CORE_SAGA',
            ...context
        });
        this.name = 'ConcurrencyError';
    }
}

export type FailureKind = 'needs-compensation' | 'abort-cleanly' | 'fault';

/**
 * Maps any thrown value onto the three failure kinds the executor distinguishes.
 */
export function classifyFailure(error: unknown): FailureKind {
    if (error instanceof NeedsCompensationError) return 'needs-compensation';
    if (error instanceof AbortCleanlyError) return 'abort-cleanly';
    return 'fault';
}
