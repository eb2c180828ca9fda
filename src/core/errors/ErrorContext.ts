// src/core/errors/ErrorContext.ts

/**
 * Metadata provided with an error to help with debugging and operator guidance.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'ABORTED')
    operation?: string;      // The step or request that failed
    suggestion?: string;     // Helpful tip for the operator
    component?: string;      // The layer where the error occurred
    retryable?: boolean;     // Whether re-running the migration may succeed
    details?: unknown;       // Original error or additional technical context
}
