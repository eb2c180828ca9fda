// tests/unit/migration_steps.test.ts

import { ForwardRegistry } from '../../src/core/saga/ForwardRegistry';
import {
    AbortCleanlyError,
    ExternalServiceError,
    NeedsCompensationError,
    PlatformApiError,
} from '../../src/core/errors';
import {
    bindAll,
    CheckSourceStep,
    endpointName,
    EnsureTransferServiceStep,
    findRebindings,
    maintenanceDuration,
    MaintenanceStep,
    parseAttachment,
    ProvisionStep,
    RebindStep,
    resolveBinding,
    ScaleZeroStep,
    transferFailureMessage,
    TransferStep,
} from '../../src/migration/steps';
import { Logger, LogLevel } from '../../src/core/logging/Logger';
import { MigrationPayloads, StepId } from '../../src/migration/types';
import { APP, buildWorld, NEW_URL, OLD_URL, TRANSFER_URL } from '../support/fixtures';
import { transferHandle } from '../support/FakeTransferService';

function provisioned(configSnapshot: Record<string, string>): ForwardRegistry<MigrationPayloads> {
    const forward = new ForwardRegistry<MigrationPayloads>();
    forward.record(StepId.Provision, { bindingName: 'HEROKU_POSTGRESQL_RED_URL', configSnapshot });
    return forward;
}

describe('CheckSourceStep', () => {
    it('aborts cleanly when the app has no shared database', async () => {
        const { ctx, platform } = buildWorld({ configVars: { DATABASE_URL: NEW_URL } });

        await expect(new CheckSourceStep(ctx).perform()).rejects.toBeInstanceOf(AbortCleanlyError);
        await expect(new CheckSourceStep(ctx).perform()).rejects.toThrow(`No SHARED_DATABASE_URL found on ${APP}: cannot migrate.`);
        expect(platform.mutations()).toEqual([]);
    });

    it('passes without emitting anything when the source is bound', async () => {
        const { ctx } = buildWorld();
        const outcome = await new CheckSourceStep(ctx).perform();

        expect(outcome.moreSteps).toEqual([]);
        expect(outcome.moreRollbacks).toEqual([]);
        expect(outcome.forward).toBeUndefined();
    });
});

describe('EnsureTransferServiceStep', () => {
    it('installs the transfer add-on', async () => {
        const { ctx, platform, out } = buildWorld();

        await new EnsureTransferServiceStep(ctx).perform();

        expect(platform.configVars.PGBACKUPS_URL).toBe(TRANSFER_URL);
        expect(out.text()).toBe('Installing pgbackups:plus on example-app... done, pgbackups:plus added\n');
    });

    it('treats an already-installed add-on as success', async () => {
        const { ctx, platform, out } = buildWorld();
        platform.failWith = (call) => call.method === 'provisionAddon'
            ? new PlatformApiError(422, 'Add-on already installed.')
            : undefined;

        await expect(new EnsureTransferServiceStep(ctx).perform()).resolves.toBeDefined();
        expect(out.text()).toBe('Installing pgbackups:plus on example-app... done, already installed\n');
    });

    it('re-raises any other provisioning error', async () => {
        const { ctx, platform, out } = buildWorld();
        const failure = new PlatformApiError(500, 'Internal server error');
        platform.failWith = (call) => call.method === 'provisionAddon' ? failure : undefined;

        await expect(new EnsureTransferServiceStep(ctx).perform()).rejects.toBe(failure);
        expect(out.text()).toBe('Installing pgbackups:plus on example-app... failed\n');
    });
});

describe('ProvisionStep', () => {
    it('parses the attachment name, snapshots config and enqueues the rebind', async () => {
        const { ctx } = buildWorld();

        const outcome = await new ProvisionStep(ctx).perform();

        expect(outcome.forward).toEqual({
            bindingName: 'HEROKU_POSTGRESQL_RED_URL',
            configSnapshot: {
                SHARED_DATABASE_URL: OLD_URL,
                DATABASE_URL: OLD_URL,
                RAILS_ENV: 'production',
                HEROKU_POSTGRESQL_RED_URL: NEW_URL
            }
        });
        expect(outcome.moreSteps.map(step => step.id)).toEqual([StepId.Rebind]);
        expect(outcome.moreRollbacks).toEqual([]);
    });

    it('aborts cleanly when the source vanished during provisioning', async () => {
        const { ctx, platform } = buildWorld();
        const realGet = platform.getConfigVars.bind(platform);
        platform.getConfigVars = async (app: string) => {
            const vars = await realGet(app);
            delete vars.SHARED_DATABASE_URL;
            return vars;
        };

        await expect(new ProvisionStep(ctx).perform()).rejects.toBeInstanceOf(AbortCleanlyError);
    });

    it('fails when the provisioning message names no config var', async () => {
        const { ctx, platform } = buildWorld();
        platform.provisionAddon = async () => ({ message: 'Database is being provisioned' });

        await expect(new ProvisionStep(ctx).perform()).rejects.toBeInstanceOf(ExternalServiceError);
    });

    it('reads the attachment line out of a multi-line message', () => {
        expect(parseAttachment('Creating database...\nAttached as HEROKU_POSTGRESQL_RED\nUse pg:promote to make it primary'))
            .toBe('HEROKU_POSTGRESQL_RED');
        expect(parseAttachment('Attached as heroku_postgresql_red')).toBeNull();
        expect(parseAttachment(null)).toBeNull();
    });

    it('resolves the attachment to an existing config var', () => {
        expect(resolveBinding({ HEROKU_POSTGRESQL_RED_URL: NEW_URL }, 'HEROKU_POSTGRESQL_RED')).toBe('HEROKU_POSTGRESQL_RED_URL');
        expect(resolveBinding({ HEROKU_POSTGRESQL_RED: NEW_URL }, 'HEROKU_POSTGRESQL_RED')).toBe('HEROKU_POSTGRESQL_RED');
        expect(resolveBinding({}, 'HEROKU_POSTGRESQL_RED')).toBeNull();
    });
});

describe('MaintenanceStep', () => {
    it('enables maintenance and registers itself for compensation', async () => {
        const { ctx, platform } = buildWorld();
        const step = new MaintenanceStep(ctx);

        const outcome = await step.perform();

        expect(platform.maintenance).toBe(true);
        expect(outcome.moreRollbacks).toEqual([step]);
    });

    it('asks for compensation when the request fails', async () => {
        const { ctx, platform } = buildWorld();
        const failure = new PlatformApiError(503, 'Service unavailable');
        platform.failWith = (call) => call.method === 'setMaintenance' ? failure : undefined;

        const error = await new MaintenanceStep(ctx).perform().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(NeedsCompensationError);
        expect(error).toMatchObject({ message: 'Service unavailable', cause: failure });
    });

    it('does nothing on rollback before perform', async () => {
        const { ctx, platform } = buildWorld();
        await new MaintenanceStep(ctx).rollback();
        expect(platform.calls).toEqual([]);
    });

    it('leaves maintenance mode on rollback', async () => {
        const { ctx, platform, out } = buildWorld();
        const step = new MaintenanceStep(ctx);
        await step.perform();

        await step.rollback();

        expect(platform.maintenanceHistory).toEqual([true, false]);
        expect(out.text()).toBe(
            'Entering maintenance mode on application example-app... done\n' +
            'Leaving maintenance mode on application example-app... done\n'
        );
    });

    it('logs how long the app was in maintenance once it is back', async () => {
        const { ctx } = buildWorld();
        const step = new MaintenanceStep(ctx);
        await step.perform();
        const initialLevel = Logger.getLevel();
        Logger.setLevel(LogLevel.INFO);
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        let lines: unknown[] = [];
        try {
            await step.rollback();
            lines = errorSpy.mock.calls.map(call => call[0]);
        } finally {
            Logger.setLevel(initialLevel);
            errorSpy.mockRestore();
        }

        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatch(/\[INFO\] \[MaintenanceStep\] example-app was in maintenance mode for \d+s$/);
    });

    it('formats maintenance durations', () => {
        const since = new Date('2026-01-01T00:00:00Z');
        expect(maintenanceDuration(since, new Date('2026-01-01T00:00:42Z'))).toBe('42s');
        expect(maintenanceDuration(since, new Date('2026-01-01T00:03:05Z'))).toBe('3m 5s');
        expect(maintenanceDuration(since, new Date('2025-12-31T23:59:59Z'))).toBe('0s');
    });
});

describe('ScaleZeroStep', () => {
    it('scales every process type to zero and restores the counts on rollback', async () => {
        const { ctx, platform } = buildWorld();
        const step = new ScaleZeroStep(ctx);

        const outcome = await step.perform();
        expect(platform.processCounts).toEqual({ web: 0, worker: 0 });
        expect(outcome.moreRollbacks).toEqual([step]);

        await step.rollback();
        expect(platform.processCounts).toEqual({ web: 2, worker: 1 });
    });

    it('does nothing on rollback when counts were never captured', async () => {
        const { ctx, platform } = buildWorld();
        await new ScaleZeroStep(ctx).rollback();
        expect(platform.calls).toEqual([]);
    });

    it('skips scaling when no process is running', async () => {
        const { ctx, platform, out } = buildWorld();
        platform.processCounts = {};

        await new ScaleZeroStep(ctx).perform();

        expect(out.text()).toBe('No active processes to scale down, skipping\n');
        expect(platform.mutations()).toEqual([]);
    });

    it('asks for compensation when a scale request fails part way', async () => {
        const { ctx, platform } = buildWorld();
        platform.failWith = (call) => call.method === 'setProcessCount' && call.args[1] === 'worker' && call.args[2] === 0
            ? new PlatformApiError(500, 'scale failed')
            : undefined;
        const step = new ScaleZeroStep(ctx);

        await expect(step.perform()).rejects.toBeInstanceOf(NeedsCompensationError);
        expect(platform.processCounts).toEqual({ web: 0, worker: 1 });

        await step.rollback();
        expect(platform.processCounts).toEqual({ web: 2, worker: 1 });
    });

    it('restores the remaining types when one restore fails, then reports it', async () => {
        const { ctx, platform } = buildWorld();
        const step = new ScaleZeroStep(ctx);
        await step.perform();
        platform.failWith = (call) => call.method === 'setProcessCount' && call.args[1] === 'web'
            ? new PlatformApiError(500, 'scale failed')
            : undefined;

        await expect(step.rollback()).rejects.toThrow('Could not restore scale for: web');
        expect(platform.processCounts).toEqual({ web: 0, worker: 1 });
    });
});

describe('TransferStep', () => {
    const snapshot = {
        SHARED_DATABASE_URL: OLD_URL,
        HEROKU_POSTGRESQL_RED_URL: NEW_URL,
        PGBACKUPS_URL: TRANSFER_URL
    };

    it('copies from the shared database to the new one and polls to completion', async () => {
        const { ctx, transfers, transferUrls, out } = buildWorld();

        await new TransferStep(ctx).perform(provisioned(snapshot));

        expect(transferUrls).toEqual([TRANSFER_URL]);
        expect(transfers.created).toEqual([{
            from: { url: OLD_URL, name: 'SHARED_DATABASE' },
            to: { url: NEW_URL, name: 'HEROKU_POSTGRESQL_RED' }
        }]);
        expect(transfers.polls).toBe(2);
        expect(out.text()).toBe('Transferring data from SHARED_DATABASE to HEROKU_POSTGRESQL_RED... done\n');
    });

    it('aborts cleanly when the service reports an error', async () => {
        const { ctx } = buildWorld({
            transferScript: [transferHandle({ errorAt: '2026-01-01T00:00:00Z', log: 'psql: FATAL: password authentication failed' })]
        });

        await expect(new TransferStep(ctx).perform(provisioned(snapshot))).rejects.toThrow(
            new AbortCleanlyError('An error occurred and the data transfer did not finish.\nThe database credentials are incorrect.')
        );
    });

    it('aborts cleanly when no transfer service is bound', async () => {
        const { ctx } = buildWorld();
        const { PGBACKUPS_URL, ...withoutService } = snapshot;

        await expect(new TransferStep(ctx).perform(provisioned(withoutService))).rejects.toBeInstanceOf(AbortCleanlyError);
        expect(PGBACKUPS_URL).toBe(TRANSFER_URL);
    });

    it('explains transfer failures from the log', () => {
        expect(transferFailureMessage('could not translate host: Name or service not known')).toBe(
            'An error occurred and the data transfer did not finish.\nThe database is not yet online. Please try again.'
        );
        expect(transferFailureMessage('')).toBe('An error occurred and the data transfer did not finish.');
        expect(endpointName('HEROKU_POSTGRESQL_RED_URL')).toBe('HEROKU_POSTGRESQL_RED');
    });
});

describe('RebindStep', () => {
    const snapshot = { SHARED_DATABASE_URL: OLD_URL, HEROKU_POSTGRESQL_RED_URL: NEW_URL };

    it('binds every var that pointed at the old database to the new one', async () => {
        const { ctx, platform } = buildWorld({
            configVars: { SHARED_DATABASE_URL: OLD_URL, DATABASE_URL: OLD_URL, RAILS_ENV: 'production', HEROKU_POSTGRESQL_RED_URL: NEW_URL }
        });

        const outcome = await new RebindStep(ctx).perform(provisioned(snapshot));

        expect(platform.configVars).toEqual({
            SHARED_DATABASE_URL: NEW_URL,
            DATABASE_URL: NEW_URL,
            RAILS_ENV: 'production',
            HEROKU_POSTGRESQL_RED_URL: NEW_URL
        });
        expect(outcome.moreRollbacks).toEqual([]);
    });

    it('rebinds the same vars to the old database on rollback', async () => {
        const { ctx, platform } = buildWorld();
        const step = new RebindStep(ctx);
        await step.perform(provisioned(snapshot));

        await step.rollback();

        expect(platform.configVars.SHARED_DATABASE_URL).toBe(OLD_URL);
        expect(platform.configVars.DATABASE_URL).toBe(OLD_URL);
        expect(platform.mutations().map(call => call.args[1])).toEqual([
            { SHARED_DATABASE_URL: NEW_URL, DATABASE_URL: NEW_URL },
            { SHARED_DATABASE_URL: OLD_URL, DATABASE_URL: OLD_URL }
        ]);
    });

    it('asks for compensation when the config write fails', async () => {
        const { ctx, platform } = buildWorld();
        platform.failWith = (call) => call.method === 'putConfigVars' ? new PlatformApiError(500, 'write failed') : undefined;

        await expect(new RebindStep(ctx).perform(provisioned(snapshot))).rejects.toBeInstanceOf(NeedsCompensationError);
    });

    it('does nothing on rollback before perform', async () => {
        const { ctx, platform } = buildWorld();
        await new RebindStep(ctx).rollback();
        expect(platform.calls).toEqual([]);
    });

    it('selects vars by exact value', () => {
        expect(findRebindings({ A: OLD_URL, B: `${OLD_URL}?sslmode=require`, C: OLD_URL }, OLD_URL)).toEqual(['A', 'C']);
        expect(bindAll(['A', 'C'], NEW_URL)).toEqual({ A: NEW_URL, C: NEW_URL });
    });
});
