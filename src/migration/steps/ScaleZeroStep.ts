// src/migration/steps/ScaleZeroStep.ts

import { ErrorFactory } from '../../core/errors';
import { capture, Captured, NOT_CAPTURED } from '../../core/saga/types';
import { ProcessCounts } from '../../infrastructure/platform/types';
import { MigrationContext, MigrationOutcome, MigrationStep, outcome, StepId } from '../types';

/**
 * Stops every process so nothing writes to the source database during the copy.
 */
export class ScaleZeroStep implements MigrationStep<StepId.ScaleZero> {
    public readonly id = StepId.ScaleZero;
    public readonly description = 'Scale all processes to zero';

    private previousCounts: Captured<ProcessCounts> = NOT_CAPTURED;

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(): Promise<MigrationOutcome<StepId.ScaleZero>> {
        const { app, platform, progress } = this.ctx;

        // Reading the counts mutates nothing; a failure here needs no rollback
        const counts = await platform.getProcessCounts(app);
        this.previousCounts = capture({ ...counts });

        const processTypes = Object.keys(counts);
        if (processTypes.length === 0) {
            progress.message('No active processes to scale down, skipping');
        }

        try {
            for (const processType of processTypes) {
                await progress.action(`Scaling process ${processType} to 0`, () =>
                    platform.setProcessCount(app, processType, 0)
                );
            }
        } catch (error) {
            throw ErrorFactory.needsCompensation(error, { operation: this.id });
        }

        return outcome<StepId.ScaleZero>({ moreRollbacks: [this] });
    }

    /**
     * Restores every recorded count, continuing past individual failures.
     */
    public async rollback(): Promise<void> {
        if (!this.previousCounts.captured) return;

        const { app, platform, progress } = this.ctx;
        const failed: Array<{ processType: string; error: unknown }> = [];

        for (const [processType, quantity] of Object.entries(this.previousCounts.value)) {
            try {
                await progress.action(`Restoring process ${processType} scale to ${quantity}`, () =>
                    platform.setProcessCount(app, processType, quantity)
                );
            } catch (error) {
                failed.push({ processType, error });
            }
        }

        if (failed.length > 0) {
            throw ErrorFactory.external(`Could not restore scale for: ${failed.map(f => f.processType).join(', ')}`, {
                operation: `${this.id}.rollback`,
                retryable: true,
                details: failed
            });
        }
    }
}
