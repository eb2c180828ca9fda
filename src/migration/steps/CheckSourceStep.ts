// src/migration/steps/CheckSourceStep.ts

import { ErrorFactory } from '../../core/errors';
import { MigrationContext, MigrationOutcome, MigrationStep, outcome, StepId } from '../types';

/**
 * Pre-flight: the app must still be bound to a shared database.
 * Performs no mutation, so a failure here leaves nothing to undo.
 */
export class CheckSourceStep implements MigrationStep<StepId.CheckSource> {
    public readonly id = StepId.CheckSource;
    public readonly description = 'Check for a shared database to migrate';

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(): Promise<MigrationOutcome<StepId.CheckSource>> {
        const { app, platform, settings } = this.ctx;
        const vars = await platform.getConfigVars(app);

        if (!vars[settings.sourceConfigVar]) {
            throw ErrorFactory.abort(`No ${settings.sourceConfigVar} found on ${app}: cannot migrate.`, {
                operation: this.id,
                suggestion: 'The application is not using a shared database; there is nothing to migrate.'
            });
        }

        return outcome<StepId.CheckSource>();
    }
}
