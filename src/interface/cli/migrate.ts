// src/interface/cli/migrate.ts

import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { ErrorFactory, MigrateError } from '../../core/errors';
import { Logger, LogLevel } from '../../core/logging/Logger';
import { CancellationGuard, SignalSource } from '../../core/saga/CancellationGuard';
import { UnwindReport } from '../../core/saga/CompensationStack';
import { RetryPolicy } from '../../core/saga/RetryPolicy';
import { PlatformClient } from '../../infrastructure/platform/PlatformClient';
import { ControlPlane } from '../../infrastructure/platform/types';
import { TransferClient } from '../../infrastructure/transfer/TransferClient';
import { TransferServiceFactory } from '../../infrastructure/transfer/types';
import { buildMigrationPlan, createMigrationExecutor } from '../../migration/plan';
import { ConsoleProgress, OutputStream } from '../../migration/progress';
import { MigrationContext, MigrationSettings, settingsFromConfig } from '../../migration/types';

// Names and UUIDs both address an app; either becomes a single path segment
const AppNameSchema = z.string()
    .trim()
    .min(1, 'must not be empty')
    .regex(/^[^/\s]+$/, 'must not contain slashes or whitespace');

export interface MigrateCommandOptions {
    verbose?: boolean;
}

/**
 * Collaborators the command builds from the environment unless given.
 */
export interface MigrateCommandDeps {
    platform?: ControlPlane;
    transfers?: TransferServiceFactory;
    settings?: MigrationSettings;
    retryPolicy?: RetryPolicy;
    signals?: SignalSource;
    out?: OutputStream;
    err?: OutputStream;
}

function describeError(error: unknown): string {
    if (error instanceof MigrateError) return error.toUserFriendly();
    if (error instanceof Error) return error.message;
    return String(error);
}

function reportUnwindFailures(report: UnwindReport | null, err: OutputStream): void {
    if (!report) return;
    for (const failure of report.failures) {
        err.write(` !    Could not undo "${failure.description}": ${describeError(failure.error)}\n`);
    }
    if (report.failures.length > 0) {
        err.write(' !    Inspect the application manually before retrying.\n');
    }
}

/**
 * Runs `pg-migrate <app>`. Resolves to the process exit code:
 * 0 on completion or clean abort, 1 on any other failure.
 */
export async function migrateCommand(
    app: string,
    options: MigrateCommandOptions = {},
    deps: MigrateCommandDeps = {}
): Promise<number> {
    const out = deps.out ?? process.stdout;
    const err = deps.err ?? process.stderr;

    if (options.verbose) {
        Logger.setLevel(LogLevel.DEBUG);
    }

    const appName = AppNameSchema.safeParse(app);
    if (!appName.success) {
        const error = ErrorFactory.validation(`Invalid app name "${app}": ${appName.error.issues[0].message}`, {
            operation: 'migrate'
        });
        err.write(` !    ${error.toUserFriendly()}\n`);
        return 1;
    }

    let platform: ControlPlane;
    try {
        platform = deps.platform ?? PlatformClient.fromEnv();
    } catch (error) {
        err.write(` !    ${describeError(error)}\n`);
        return 1;
    }

    const cancellation = new CancellationGuard();
    const dispose = cancellation.install(deps.signals);

    const ctx: MigrationContext = {
        app: appName.data,
        platform,
        transfers: deps.transfers ?? ((url) => new TransferClient(url)),
        progress: new ConsoleProgress(out),
        settings: deps.settings ?? settingsFromConfig(),
        cancellation
    };
    const executor = createMigrationExecutor(
        deps.retryPolicy ?? new RetryPolicy({
            maxAttempts: CONFIG.ROLLBACK.MAX_ATTEMPTS,
            backoffMs: CONFIG.ROLLBACK.BACKOFF_MS
        }),
        cancellation
    );

    try {
        const result = await executor.engage(buildMigrationPlan(ctx));
        reportUnwindFailures(result.unwind, err);

        if (result.status === 'aborted') {
            err.write(` !    ${result.reason ?? 'Migration aborted.'}\n`);
            return 0;
        }

        out.write(`Migration of ${appName.data} complete.\n`);
        return 0;
    } catch (error) {
        reportUnwindFailures(executor.getLastUnwindReport(), err);
        err.write(` !    ${describeError(error)}\n`);
        return 1;
    } finally {
        dispose();
    }
}
