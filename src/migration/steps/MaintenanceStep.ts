// src/migration/steps/MaintenanceStep.ts

import { ErrorFactory } from '../../core/errors';
import { Logger } from '../../core/logging/Logger';
import { capture, Captured, NOT_CAPTURED } from '../../core/saga/types';
import { MigrationContext, MigrationOutcome, MigrationStep, outcome, StepId } from '../types';

export function maintenanceDuration(since: Date, now: Date = new Date()): string {
    const seconds = Math.max(0, Math.round((now.getTime() - since.getTime()) / 1000));
    return seconds < 60 ? `${seconds}s` : `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

/**
 * Puts the application into maintenance mode for the duration of the run.
 * Registered for compensation on success; a failed request may still have
 * taken effect, so it asks for compensation on failure as well.
 */
export class MaintenanceStep implements MigrationStep<StepId.Maintenance> {
    public readonly id = StepId.Maintenance;
    public readonly description = 'Enable maintenance mode';

    /** When maintenance was requested; rollback has nothing to do before that. */
    private requestedAt: Captured<Date> = NOT_CAPTURED;

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(): Promise<MigrationOutcome<StepId.Maintenance>> {
        const { app, platform, progress } = this.ctx;

        await progress.action(`Entering maintenance mode on application ${app}`, async () => {
            this.requestedAt = capture(new Date());
            try {
                await platform.setMaintenance(app, true);
            } catch (error) {
                throw ErrorFactory.needsCompensation(error, { operation: this.id });
            }
        });

        return outcome<StepId.Maintenance>({ moreRollbacks: [this] });
    }

    public async rollback(): Promise<void> {
        if (!this.requestedAt.captured) return;

        const { app, platform, progress } = this.ctx;
        await progress.action(`Leaving maintenance mode on application ${app}`, () =>
            platform.setMaintenance(app, false)
        );
        Logger.info('MaintenanceStep', `${app} was in maintenance mode for ${maintenanceDuration(this.requestedAt.value)}`);
    }
}
