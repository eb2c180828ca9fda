// src/migration/steps/RebindStep.ts

import { ErrorFactory } from '../../core/errors';
import { capture, Captured, ForwardReader, NOT_CAPTURED } from '../../core/saga/types';
import { ConfigVars } from '../../infrastructure/platform/types';
import { MigrationContext, MigrationOutcome, MigrationPayloads, MigrationStep, outcome, StepId } from '../types';

/**
 * Names of every config var whose value is exactly `url`.
 */
export function findRebindings(vars: ConfigVars, url: string): string[] {
    return Object.entries(vars)
        .filter(([, value]) => value === url)
        .map(([name]) => name);
}

export function bindAll(names: ReadonlyArray<string>, url: string): ConfigVars {
    const vars: ConfigVars = {};
    for (const name of names) {
        vars[name] = url;
    }
    return vars;
}

interface Rebinding {
    names: string[];
    oldUrl: string;
}

/**
 * Points every config var that referenced the shared database at the new one.
 * Only a failed rebind asks for compensation; a successful one is the
 * point of the migration and stays in place.
 */
export class RebindStep implements MigrationStep<StepId.Rebind> {
    public readonly id = StepId.Rebind;
    public readonly description = 'Bind configuration to the new database';

    private rebinding: Captured<Rebinding> = NOT_CAPTURED;

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(forward: ForwardReader<MigrationPayloads>): Promise<MigrationOutcome<StepId.Rebind>> {
        const { app, platform, progress, settings } = this.ctx;
        const { bindingName, configSnapshot } = forward.require(StepId.Provision);

        const newUrl = configSnapshot[bindingName];
        const vars = await platform.getConfigVars(app);
        const oldUrl = vars[settings.sourceConfigVar];
        if (!oldUrl) {
            throw ErrorFactory.abort(`${settings.sourceConfigVar} disappeared from ${app} before rebinding: cannot migrate.`, {
                operation: this.id
            });
        }

        const names = findRebindings(vars, oldUrl);
        await progress.action(`Binding new database configuration to: ${names.join(', ')}`, async () => {
            this.rebinding = capture({ names, oldUrl });
            try {
                await platform.putConfigVars(app, bindAll(names, newUrl));
            } catch (error) {
                throw ErrorFactory.needsCompensation(error, { operation: this.id });
            }
        });

        return outcome<StepId.Rebind>();
    }

    public async rollback(): Promise<void> {
        if (!this.rebinding.captured) return;

        const { app, platform, progress } = this.ctx;
        const { names, oldUrl } = this.rebinding.value;
        await progress.action(`Binding old database configuration to: ${names.join(', ')}`, () =>
            platform.putConfigVars(app, bindAll(names, oldUrl))
        );
    }
}
