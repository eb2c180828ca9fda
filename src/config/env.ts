// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

/**
 * Nearest directory at or above `start` holding a package.json. Sources run
 * from src/config and builds from dist/src/config, so a fixed relative path
 * cannot reach the project root from both.
 */
export function findProjectRoot(start: string): string {
    let dir = start;
    while (!fs.existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) return start;
        dir = parent;
    }
    return dir;
}

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.join(findProjectRoot(__dirname), '.env') });

/**
 * Environment Variable Schema
 * Enforces strict validation for control-plane credentials and migration tuning.
 */
const envSchema = z.object({
    // Runtime
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

    // Control plane
    PLATFORM_API_URL: z.string().url().default('https://api.heroku.com'),
    PLATFORM_API_KEY: z.string().min(1).optional(),
    PLATFORM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    // Add-on plans
    DESTINATION_ADDON: z.string().min(1).default('heroku-postgresql:dev'),
    TRANSFER_ADDON: z.string().min(1).default('pgbackups:plus'),

    // Transfer polling
    TRANSFER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),

    // Rollback attempts per compensation; 1 means a single try
    ROLLBACK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(1),
    ROLLBACK_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
});

export type Env = z.infer<typeof envSchema>;

// Process and validate
const _env = envSchema.parse(process.env);

if (_env.NODE_ENV === 'production' && !_env.PLATFORM_API_KEY) {
    process.stderr.write('⚠️  WARNING: PLATFORM_API_KEY is not set; control-plane requests will be rejected.\n');
}

export const ENV: Env = _env;
