// src/migration/types.ts

import { CONFIG } from '../config/config';
import { CancellationGuard } from '../core/saga/CancellationGuard';
import { emit, OutcomeParts, Step, StepOutcome } from '../core/saga/types';
import { ConfigVars, ControlPlane } from '../infrastructure/platform/types';
import { TransferServiceFactory } from '../infrastructure/transfer/types';
import { ProgressReporter } from './progress';

/**
 * Identity of every migration step; also the key of the forward registry.
 */
export enum StepId {
    CheckSource = 'check-source',
    EnsureTransferService = 'ensure-transfer-service',
    Provision = 'provision',
    Maintenance = 'maintenance',
    ScaleZero = 'scale-zero',
    Transfer = 'transfer',
    Rebind = 'rebind',
}

/**
 * Published by Provision: the config var bound to the new database and the
 * full config as it stood right after provisioning.
 */
export interface ProvisionPayload {
    bindingName: string;
    configSnapshot: Readonly<ConfigVars>;
}

export type MigrationPayloads = {
    [StepId.CheckSource]: undefined;
    [StepId.EnsureTransferService]: undefined;
    [StepId.Provision]: ProvisionPayload;
    [StepId.Maintenance]: undefined;
    [StepId.ScaleZero]: undefined;
    [StepId.Transfer]: undefined;
    [StepId.Rebind]: undefined;
};

export type MigrationStep<K extends StepId = StepId> = Step<MigrationPayloads, K>;
export type MigrationOutcome<K extends StepId> = StepOutcome<MigrationPayloads, K>;

export function outcome<K extends StepId>(parts: OutcomeParts<MigrationPayloads, K> = {}): MigrationOutcome<K> {
    return emit<MigrationPayloads, K>(parts);
}

export interface MigrationSettings {
    /** Config var holding the legacy shared database URL. */
    sourceConfigVar: string;
    /** Config var the transfer add-on publishes its service URL under. */
    transferServiceConfigVar: string;
    destinationAddon: string;
    transferAddon: string;
    pollIntervalMs: number;
}

export function settingsFromConfig(): MigrationSettings {
    return {
        sourceConfigVar: CONFIG.MIGRATION.SOURCE_CONFIG_VAR,
        transferServiceConfigVar: CONFIG.MIGRATION.TRANSFER_SERVICE_CONFIG_VAR,
        destinationAddon: CONFIG.MIGRATION.DESTINATION_ADDON,
        transferAddon: CONFIG.MIGRATION.TRANSFER_ADDON,
        pollIntervalMs: CONFIG.TRANSFER.POLL_INTERVAL_MS,
    };
}

/**
 * Everything a migration step needs, shared by all steps of one run.
 */
export interface MigrationContext {
    app: string;
    platform: ControlPlane;
    transfers: TransferServiceFactory;
    progress: ProgressReporter;
    settings: MigrationSettings;
    cancellation?: CancellationGuard;
}
