// src/core/saga/SagaExecutor.ts

import { Mutex, tryAcquire } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { AbortCleanlyError, classifyFailure, ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { CancellationGuard } from './CancellationGuard';
import { CompensationStack, UnwindReport } from './CompensationStack';
import { ForwardRegistry } from './ForwardRegistry';
import { RetryPolicy } from './RetryPolicy';
import { PayloadMap, Step, StepOutcome } from './types';

export type EngageStatus = 'completed' | 'aborted';

export interface EngageResult<T extends PayloadMap> {
    runId: string;
    status: EngageStatus;
    /** Operator-facing explanation when the run aborted cleanly. */
    reason?: string;
    /** Ids of the steps whose perform succeeded, in execution order. */
    performed: Array<keyof T & string>;
    unwind: UnwindReport;
}

export interface SagaExecutorOptions {
    retryPolicy?: RetryPolicy;
    cancellation?: CancellationGuard;
}

const MODULE = 'SagaExecutor';

/**
 * SagaExecutor
 *
 * Runs steps strictly in FIFO order, appending the follow-up steps each one
 * emits, and drains the compensation stack when the run ends, whether it
 * completed, aborted cleanly or failed. Queue, stack and forward registry
 * are created fresh for every engage call.
 */
export class SagaExecutor<T extends PayloadMap> {
    private readonly runLock: Mutex = new Mutex();
    private readonly retryPolicy: RetryPolicy;
    private readonly cancellation?: CancellationGuard;
    private lastUnwind: UnwindReport | null = null;

    constructor(options: SagaExecutorOptions = {}) {
        this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
        this.cancellation = options.cancellation;
    }

    /**
     * Report of the most recent unwind, also available when engage rejected.
     */
    public getLastUnwindReport(): UnwindReport | null {
        return this.lastUnwind;
    }

    /**
     * Executes the steps. Resolves on completion or clean abort; rejects with the
     * original failure otherwise, in every case only after the unwind finished.
     * A second engage while one is running is rejected with a ConcurrencyError.
     */
    public async engage(steps: ReadonlyArray<Step<T>>): Promise<EngageResult<T>> {
        const busy = ErrorFactory.concurrency('A migration run is already in progress on this executor', {
            operation: 'SagaExecutor.engage'
        });
        return await tryAcquire(this.runLock, busy).runExclusive(() => this.run(steps));
    }

    private async run(steps: ReadonlyArray<Step<T>>): Promise<EngageResult<T>> {
        const runId = uuidv4();
        const queue: Array<Step<T>> = [...steps];
        const forward = new ForwardRegistry<T>();
        const compensation = new CompensationStack<T>(this.retryPolicy);
        const performed: Array<keyof T & string> = [];

        let status: EngageStatus = 'completed';
        let reason: string | undefined;
        let failure: { error: unknown } | null = null;

        Logger.info(MODULE, `Run ${runId} engaged with ${queue.length} initial steps`);

        let unwind: UnwindReport;
        try {
            for (let step = queue.shift(); step !== undefined; step = queue.shift()) {
                this.cancellation?.throwIfCancelled();

                const outcome = await this.performStep(step, forward, compensation);
                performed.push(step.id);

                queue.push(...outcome.moreSteps);
                compensation.push(...outcome.moreRollbacks);
                if (outcome.forward !== undefined) {
                    forward.record(step.id, outcome.forward);
                }
            }
            Logger.info(MODULE, `Run ${runId} performed all ${performed.length} steps`);
        } catch (error) {
            if (error instanceof AbortCleanlyError) {
                status = 'aborted';
                reason = error.message;
                Logger.warn(MODULE, `Run ${runId} aborted: ${error.message}`);
            } else {
                failure = { error };
                Logger.error(MODULE, `Run ${runId} failed after ${performed.length} steps`, error);
            }
        } finally {
            // Runs on every exit from the loop, whatever the catch block did
            this.cancellation?.beginUnwind();
            unwind = await compensation.unwind();
            this.lastUnwind = unwind;
        }

        if (unwind.failures.length > 0) {
            Logger.warn(MODULE, `Run ${runId} left ${unwind.failures.length} compensation(s) unfinished`, {
                steps: unwind.failures.map(f => f.stepId)
            });
        }

        if (failure) {
            throw failure.error;
        }

        return { runId, status, reason, performed, unwind };
    }

    private async performStep(
        step: Step<T>,
        forward: ForwardRegistry<T>,
        compensation: CompensationStack<T>
    ): Promise<StepOutcome<T>> {
        Logger.debug(MODULE, `Performing ${step.id}: ${step.description}`);
        try {
            return await step.perform(forward);
        } catch (error) {
            if (classifyFailure(error) === 'needs-compensation') {
                // Partial side effect: the failing step itself must be undone
                compensation.push(step);
            }
            throw error;
        }
    }
}
