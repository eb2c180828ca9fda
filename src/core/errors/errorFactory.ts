// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the application.
 */
export class ErrorFactory {
    static needsCompensation(cause: unknown, context?: ErrorContext) {
        return new Errors.NeedsCompensationError(cause, context);
    }

    static abort(message: string, context?: ErrorContext) {
        return new Errors.AbortCleanlyError(message, context);
    }

    static cancelled(message?: string, context?: ErrorContext) {
        return new Errors.CancellationError(message, context);
    }

    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }

    static notFound(message: string, context?: ErrorContext) {
        return new Errors.NotFoundError(message, context);
    }

    static external(message: string, context?: ErrorContext) {
        return new Errors.ExternalServiceError(message, context);
    }

    static api(status: number, message: string, context?: ErrorContext) {
        return new Errors.PlatformApiError(status, message, context);
    }

    static concurrency(message: string, context?: ErrorContext) {
        return new Errors.ConcurrencyError(message, context);
    }
}
