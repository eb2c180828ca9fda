// src/config/config.ts

import { ENV } from './env';

interface CliConfig {
    NAME: string;
    VERSION: string;
}

interface PlatformConfig {
    API_URL: string;
    REQUEST_TIMEOUT_MS: number;
}

interface MigrationConfig {
    SOURCE_CONFIG_VAR: string;
    TRANSFER_SERVICE_CONFIG_VAR: string;
    DESTINATION_ADDON: string;
    TRANSFER_ADDON: string;
}

interface TransferConfig {
    POLL_INTERVAL_MS: number;
}

interface RollbackConfig {
    MAX_ATTEMPTS: number;
    BACKOFF_MS: number;
}

interface Config {
    CLI: CliConfig;
    PLATFORM: PlatformConfig;
    MIGRATION: MigrationConfig;
    TRANSFER: TransferConfig;
    ROLLBACK: RollbackConfig;
}

/**
 * Centralized configuration for pg-migrate.
 */
export const CONFIG: Config = {
    CLI: {
        NAME: 'pg-migrate',
        VERSION: '1.0.0',
    },

    PLATFORM: {
        API_URL: ENV.PLATFORM_API_URL,
        REQUEST_TIMEOUT_MS: ENV.PLATFORM_REQUEST_TIMEOUT_MS,
    },

    MIGRATION: {
        SOURCE_CONFIG_VAR: 'SHARED_DATABASE_URL',
        TRANSFER_SERVICE_CONFIG_VAR: 'PGBACKUPS_URL',
        DESTINATION_ADDON: ENV.DESTINATION_ADDON,
        TRANSFER_ADDON: ENV.TRANSFER_ADDON,
    },

    TRANSFER: {
        POLL_INTERVAL_MS: ENV.TRANSFER_POLL_INTERVAL_MS,
    },

    ROLLBACK: {
        MAX_ATTEMPTS: ENV.ROLLBACK_MAX_ATTEMPTS,
        BACKOFF_MS: ENV.ROLLBACK_BACKOFF_MS,
    },
};
