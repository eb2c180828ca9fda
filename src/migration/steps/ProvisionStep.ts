// src/migration/steps/ProvisionStep.ts

import { ErrorFactory } from '../../core/errors';
import { ConfigVars } from '../../infrastructure/platform/types';
import { MigrationContext, MigrationOutcome, MigrationStep, outcome, StepId } from '../types';
import { RebindStep } from './RebindStep';

const ATTACHMENT_PATTERN = /^Attached as ([A-Z][A-Z0-9_]*)$/m;

/**
 * Extracts the config var name from a provisioning message
 * ("Attached as HEROKU_POSTGRESQL_RED"). Null when absent.
 */
export function parseAttachment(message: string | null): string | null {
    if (!message) return null;
    const match = ATTACHMENT_PATTERN.exec(message);
    return match ? match[1] : null;
}

/**
 * Attachment messages name either the var itself or its prefix; prefer the exact name.
 */
export function resolveBinding(vars: ConfigVars, attachedAs: string): string | null {
    if (vars[attachedAs]) return attachedAs;
    const withSuffix = `${attachedAs}_URL`;
    if (vars[withSuffix]) return withSuffix;
    return null;
}

/**
 * Provisions the destination database and publishes its binding plus a config
 * snapshot. The config rewrite is enqueued as a follow-up Rebind step, which
 * lands after every step already queued.
 */
export class ProvisionStep implements MigrationStep<StepId.Provision> {
    public readonly id = StepId.Provision;
    public readonly description = 'Provision the destination database';

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(): Promise<MigrationOutcome<StepId.Provision>> {
        const { app, platform, progress, settings } = this.ctx;

        const attachedAs = await progress.action(`Installing ${settings.destinationAddon}`, async (status) => {
            const result = await platform.provisionAddon(app, settings.destinationAddon);
            const name = parseAttachment(result.message);
            if (!name) {
                throw ErrorFactory.external('Could not determine which config var the new database is attached as', {
                    operation: this.id,
                    details: result.message
                });
            }
            status(`attached as ${name}`);
            return name;
        });

        const configSnapshot = await platform.getConfigVars(app);

        // The source may have been removed since the pre-flight check
        if (!configSnapshot[settings.sourceConfigVar]) {
            throw ErrorFactory.abort(`${settings.sourceConfigVar} disappeared from ${app} during provisioning: cannot migrate.`, {
                operation: this.id,
                suggestion: `${settings.destinationAddon} remains attached as ${attachedAs}; remove it if it is not wanted.`
            });
        }

        const bindingName = resolveBinding(configSnapshot, attachedAs);
        if (!bindingName) {
            throw ErrorFactory.notFound(`No config var found for the new database attached as ${attachedAs}`, {
                operation: this.id
            });
        }

        return outcome<StepId.Provision>({
            moreSteps: [new RebindStep(this.ctx)],
            forward: { bindingName, configSnapshot: { ...configSnapshot } }
        });
    }
}
