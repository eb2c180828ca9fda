// src/core/saga/CompensationStack.ts

import { Logger } from '../logging/Logger';
import { RetryPolicy } from './RetryPolicy';
import { PayloadMap, Step } from './types';

export interface CompensationFailure {
    stepId: string;
    description: string;
    attempts: number;
    error: unknown;
}

export interface UnwindReport {
    /** Ids whose rollback succeeded, in the order they ran. */
    rolledBack: string[];
    /** Ids popped without a rollback operation. */
    skipped: string[];
    failures: CompensationFailure[];
}

/**
 * CompensationStack
 * LIFO collection of steps that need rolling back. The same step may be
 * pushed more than once; each entry is compensated on its own.
 */
export class CompensationStack<T extends PayloadMap> {
    private readonly entries: Array<Step<T>> = [];

    constructor(private readonly retryPolicy: RetryPolicy = new RetryPolicy()) { }

    public push(...steps: ReadonlyArray<Step<T>>): void {
        this.entries.push(...steps);
    }

    public get size(): number {
        return this.entries.length;
    }

    /**
     * Ids bottom-to-top, i.e. in push order.
     */
    public ids(): string[] {
        return this.entries.map(step => step.id);
    }

    /**
     * Pops every entry and runs its rollback. A failing rollback is logged and
     * recorded; the remaining entries still run.
     */
    public async unwind(): Promise<UnwindReport> {
        const report: UnwindReport = { rolledBack: [], skipped: [], failures: [] };

        if (this.entries.length > 0) {
            Logger.info('CompensationStack', `Executing ${this.entries.length} compensation actions...`);
        }

        for (let step = this.entries.pop(); step !== undefined; step = this.entries.pop()) {
            if (!step.rollback) {
                report.skipped.push(step.id);
                continue;
            }

            const rollback = step.rollback.bind(step);
            let attempts = 0;
            try {
                Logger.info('CompensationStack', `Compensating: ${step.description}`);
                await this.retryPolicy.run(step.description, () => {
                    attempts++;
                    return rollback();
                });
                report.rolledBack.push(step.id);
            } catch (error) {
                report.failures.push({
                    stepId: step.id,
                    description: step.description,
                    attempts,
                    error
                });
                Logger.error('CompensationStack', `CRITICAL: Compensation failed for ${step.id}`, error);
            }
        }

        return report;
    }
}
