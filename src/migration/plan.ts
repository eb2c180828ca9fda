// src/migration/plan.ts

import { CancellationGuard } from '../core/saga/CancellationGuard';
import { RetryPolicy } from '../core/saga/RetryPolicy';
import { SagaExecutor } from '../core/saga/SagaExecutor';
import {
    CheckSourceStep,
    EnsureTransferServiceStep,
    MaintenanceStep,
    ProvisionStep,
    ScaleZeroStep,
    TransferStep,
} from './steps';
import { MigrationContext, MigrationPayloads, MigrationStep } from './types';

/**
 * Initial queue. Provision appends Rebind, so the full trace is
 * check-source, ensure-transfer-service, provision, maintenance,
 * scale-zero, transfer, rebind.
 */
export function buildMigrationPlan(ctx: MigrationContext): MigrationStep[] {
    return [
        new CheckSourceStep(ctx),
        new EnsureTransferServiceStep(ctx),
        new ProvisionStep(ctx),
        new MaintenanceStep(ctx),
        new ScaleZeroStep(ctx),
        new TransferStep(ctx),
    ];
}

export function createMigrationExecutor(
    retryPolicy: RetryPolicy,
    cancellation?: CancellationGuard
): SagaExecutor<MigrationPayloads> {
    return new SagaExecutor<MigrationPayloads>({ retryPolicy, cancellation });
}
