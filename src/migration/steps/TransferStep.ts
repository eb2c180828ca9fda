// src/migration/steps/TransferStep.ts

import { ErrorFactory } from '../../core/errors';
import { Logger } from '../../core/logging/Logger';
import { ForwardReader } from '../../core/saga/types';
import { pollTransfer } from '../../infrastructure/transfer/pollTransfer';
import { TransferEndpoint } from '../../infrastructure/transfer/types';
import { MigrationContext, MigrationOutcome, MigrationPayloads, MigrationStep, outcome, StepId } from '../types';

/** `HEROKU_POSTGRESQL_RED_URL` → `HEROKU_POSTGRESQL_RED` */
export function endpointName(configVar: string): string {
    return configVar.replace(/_URL$/, '');
}

/**
 * Operator explanation for a transfer the service reported as failed.
 */
export function transferFailureMessage(log: string): string {
    let message = 'An error occurred and the data transfer did not finish.';
    if (/Name or service not known/.test(log)) {
        message += '\nThe database is not yet online. Please try again.';
    }
    if (/psql: FATAL:/.test(log)) {
        message += '\nThe database credentials are incorrect.';
    }
    return message;
}

/**
 * Copies the shared database into the new one through the transfer service.
 *
 * No compensation: a failed or partial copy leaves the destination as-is
 * for the operator to inspect.
 */
export class TransferStep implements MigrationStep<StepId.Transfer> {
    public readonly id = StepId.Transfer;
    public readonly description = 'Transfer data to the new database';

    constructor(private readonly ctx: MigrationContext) { }

    public async perform(forward: ForwardReader<MigrationPayloads>): Promise<MigrationOutcome<StepId.Transfer>> {
        const { progress, settings } = this.ctx;
        const { bindingName, configSnapshot } = forward.require(StepId.Provision);

        const serviceUrl = configSnapshot[settings.transferServiceConfigVar];
        if (!serviceUrl) {
            throw ErrorFactory.abort(`No ${settings.transferServiceConfigVar} found: the transfer service is unavailable.`, {
                operation: this.id,
                suggestion: `Check that ${settings.transferAddon} is installed, then re-run the migration.`
            });
        }

        const from: TransferEndpoint = {
            url: this.lookup(configSnapshot, settings.sourceConfigVar),
            name: endpointName(settings.sourceConfigVar)
        };
        const to: TransferEndpoint = {
            url: this.lookup(configSnapshot, bindingName),
            name: endpointName(bindingName)
        };

        const service = this.ctx.transfers(serviceUrl);
        const finished = await progress.action(`Transferring data from ${from.name} to ${to.name}`, async (status) => {
            const created = await service.createTransfer(from, to);
            const handle = await pollTransfer(service, created, {
                intervalMs: settings.pollIntervalMs,
                guard: this.ctx.cancellation,
                onProgress: (h) => Logger.debug('TransferStep', `Transfer ${h.id}: ${h.progress ?? 'pending'}`)
            });
            if (handle.errorAt) status(`error reported at ${handle.errorAt}`);
            return handle;
        });

        if (finished.errorAt) {
            Logger.debug('TransferStep', `Transfer ${finished.id} log`, { log: finished.log });
            throw ErrorFactory.abort(transferFailureMessage(finished.log), {
                operation: this.id,
                details: { transferId: finished.id, errorAt: finished.errorAt }
            });
        }

        return outcome<StepId.Transfer>();
    }

    private lookup(vars: Readonly<Record<string, string>>, name: string): string {
        const value = vars[name];
        if (!value) {
            throw ErrorFactory.notFound(`Config snapshot has no ${name}`, { operation: this.id });
        }
        return value;
    }
}
