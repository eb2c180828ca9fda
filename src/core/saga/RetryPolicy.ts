// src/core/saga/RetryPolicy.ts

import { Logger } from '../logging/Logger';

export interface RetryPolicyConfig {
    maxAttempts: number;
    backoffMs: number;
}

export type Sleeper = (ms: number) => Promise<void>;

const defaultSleep: Sleeper = (ms) => new Promise(r => setTimeout(r, ms));

/**
 * RetryPolicy
 * Bounded attempts with exponential backoff for a single compensating action.
 * With maxAttempts = 1 an action is tried exactly once.
 */
export class RetryPolicy {
    private readonly config: RetryPolicyConfig;
    private readonly sleep: Sleeper;

    constructor(config: RetryPolicyConfig = { maxAttempts: 1, backoffMs: 0 }, sleep: Sleeper = defaultSleep) {
        this.config = {
            maxAttempts: Math.max(1, Math.floor(config.maxAttempts)),
            backoffMs: Math.max(0, config.backoffMs),
        };
        this.sleep = sleep;
    }

    public get maxAttempts(): number {
        return this.config.maxAttempts;
    }

    /**
     * Delay before attempt number `attempt` (2-based; the first attempt never waits).
     */
    public delayBefore(attempt: number): number {
        return this.config.backoffMs * 2 ** (attempt - 2);
    }

    /**
     * Runs the action until it succeeds or attempts run out; rethrows the last failure.
     * Resolves to the number of attempts used.
     */
    public async run(label: string, action: () => Promise<void>): Promise<number> {
        let attempt = 1;
        for (;;) {
            try {
                await action();
                return attempt;
            } catch (error) {
                if (attempt >= this.config.maxAttempts) {
                    throw error;
                }
                attempt++;
                const delay = this.delayBefore(attempt);
                Logger.warn('RetryPolicy', `${label} failed, retrying in ${delay}ms (attempt ${attempt}/${this.config.maxAttempts})`);
                await this.sleep(delay);
            }
        }
    }
}
