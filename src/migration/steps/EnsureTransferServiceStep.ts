// src/migration/steps/EnsureTransferServiceStep.ts

import { PlatformApiError } from '../../core/errors';
import { MigrationContext, MigrationOutcome, MigrationStep, outcome, StepId } from '../types';

/**
 * The control plane answers 422 with a message such as
 * "Add-on already installed." when the plan is already attached.
 */
export function isAlreadyInstalled(error: unknown): boolean {
    return error instanceof PlatformApiError
        && error.status === 422
        && /already/i.test(error.message);
}

/**
 * Makes sure the backup/transfer add-on is attached, so its service URL
 * shows up in the config snapshot Provision takes.
 */
export class EnsureTransferServiceStep implements MigrationStep<StepId.EnsureTransferService> {
    public readonly id = StepId.EnsureTransferService;
    public readonly description = 'Ensure the transfer service add-on is installed';

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(): Promise<MigrationOutcome<StepId.EnsureTransferService>> {
        const { app, platform, progress, settings } = this.ctx;

        await progress.action(`Installing ${settings.transferAddon} on ${app}`, async (status) => {
            try {
                const result = await platform.provisionAddon(app, settings.transferAddon);
                if (result.message) status(result.message);
            } catch (error) {
                if (!isAlreadyInstalled(error)) {
                    throw error;
                }
                status('already installed');
            }
        });

        return outcome<StepId.EnsureTransferService>();
    }
}
