// src/core/saga/CancellationGuard.ts

import { CancellationError, ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';

type Signal = 'SIGINT' | 'SIGTERM';

/**
 * Minimal surface of `process` the guard needs, so tests can pass an EventEmitter.
 */
export interface SignalSource {
    on(event: Signal, listener: () => void): unknown;
    off(event: Signal, listener: () => void): unknown;
}

/**
 * CancellationGuard
 *
 * Turns operator interrupts into a CancellationError while steps are still
 * performing, and ignores them once the unwind has begun so compensation
 * always runs to the end. The unwinding flag is never cleared.
 */
export class CancellationGuard {
    private readonly controller = new AbortController();
    private pending: CancellationError | null = null;
    private unwinding = false;

    public isUnwinding(): boolean {
        return this.unwinding;
    }

    public isCancelled(): boolean {
        return this.pending !== null;
    }

    public beginUnwind(): void {
        this.unwinding = true;
    }

    /**
     * Returns true when the request took effect.
     */
    public requestCancel(reason: string = 'Migration interrupted by operator'): boolean {
        if (this.unwinding) {
            Logger.warn('CancellationGuard', 'Interrupt ignored: compensation is in progress and will run to completion');
            return false;
        }
        if (this.pending) {
            return false;
        }

        this.pending = ErrorFactory.cancelled(reason, {
            suggestion: 'Inspect the application, then re-run the migration when ready.'
        });
        Logger.warn('CancellationGuard', `${reason}; stopping after the current step`);
        this.controller.abort(this.pending);
        return true;
    }

    public throwIfCancelled(): void {
        if (this.pending) {
            throw this.pending;
        }
    }

    /**
     * Waits `ms`, rejecting early with the CancellationError if a cancel arrives.
     */
    public sleep(ms: number): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.pending) {
                reject(this.pending);
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                reject(this.pending ?? ErrorFactory.cancelled());
            };
            const timer = setTimeout(() => {
                this.controller.signal.removeEventListener('abort', onAbort);
                resolve();
            }, ms);
            this.controller.signal.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Routes SIGINT and SIGTERM to requestCancel. Returns a disposer.
     */
    public install(source: SignalSource = process): () => void {
        const onSignal = () => {
            this.requestCancel();
        };
        source.on('SIGINT', onSignal);
        source.on('SIGTERM', onSignal);

        return () => {
            source.off('SIGINT', onSignal);
            source.off('SIGTERM', onSignal);
        };
    }
}
