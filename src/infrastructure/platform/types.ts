// src/infrastructure/platform/types.ts

/** Process type (e.g. `web`) to number of running instances. */
export type ProcessCounts = Record<string, number>;

/** Configuration variable name to value. */
export type ConfigVars = Record<string, string>;

export interface AddonResult {
    /** Human-readable provisioning message, e.g. "Attached as HEROKU_POSTGRESQL_RED". */
    message: string | null;
}

/**
 * Control-plane operations the migration drives. Each call either resolves
 * or rejects with a MigrateError subclass.
 */
export interface ControlPlane {
    setMaintenance(app: string, enabled: boolean): Promise<void>;
    getProcessCounts(app: string): Promise<ProcessCounts>;
    setProcessCount(app: string, processType: string, quantity: number): Promise<void>;
    provisionAddon(app: string, addon: string): Promise<AddonResult>;
    getConfigVars(app: string): Promise<ConfigVars>;
    putConfigVars(app: string, vars: ConfigVars): Promise<void>;
}
