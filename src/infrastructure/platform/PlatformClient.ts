// src/infrastructure/platform/PlatformClient.ts

import { CONFIG } from '../../config/config';
import { ENV } from '../../config/env';
import { ErrorFactory } from '../../core/errors';
import { basicAuth, requestJson } from '../http';
import { AddonResponseSchema, ConfigVarsSchema, IgnoredBodySchema, ProcessListSchema } from './schemas';
import { AddonResult, ConfigVars, ControlPlane, ProcessCounts } from './types';

export interface PlatformClientConfig {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
}

/**
 * Collapses running dynos (`web.1`, `web.2`, `worker.1`) into per-type counts.
 */
export function countProcesses(processNames: ReadonlyArray<string>): ProcessCounts {
    const counts: ProcessCounts = {};
    for (const name of processNames) {
        const processType = name.split('.')[0];
        counts[processType] = (counts[processType] ?? 0) + 1;
    }
    return counts;
}

/**
 * HTTP client for the application control plane.
 */
export class PlatformClient implements ControlPlane {
    private readonly baseUrl: string;
    private readonly headers: Record<string, string>;
    private readonly timeoutMs: number;

    constructor(config: PlatformClientConfig) {
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = config.timeoutMs;
        this.headers = {
            'Accept': 'application/json',
            'Authorization': basicAuth('', config.apiKey)
        };
    }

    /**
     * Builds a client from the environment. Requires PLATFORM_API_KEY.
     */
    public static fromEnv(): PlatformClient {
        if (!ENV.PLATFORM_API_KEY) {
            throw ErrorFactory.validation('PLATFORM_API_KEY is not set', {
                operation: 'PlatformClient.fromEnv',
                suggestion: 'Export PLATFORM_API_KEY or add it to .env before running the migration.'
            });
        }
        return new PlatformClient({
            baseUrl: CONFIG.PLATFORM.API_URL,
            apiKey: ENV.PLATFORM_API_KEY,
            timeoutMs: CONFIG.PLATFORM.REQUEST_TIMEOUT_MS
        });
    }

    public async setMaintenance(app: string, enabled: boolean): Promise<void> {
        await requestJson(this.form('POST', `/apps/${this.encode(app)}/server/maintenance`, 'setMaintenance', {
            maintenance_mode: enabled ? '1' : '0'
        }), IgnoredBodySchema);
    }

    public async getProcessCounts(app: string): Promise<ProcessCounts> {
        const processes = await requestJson(this.plain('GET', `/apps/${this.encode(app)}/ps`, 'getProcessCounts'), ProcessListSchema);
        return countProcesses(processes.map(p => p.process));
    }

    public async setProcessCount(app: string, processType: string, quantity: number): Promise<void> {
        await requestJson(this.form('POST', `/apps/${this.encode(app)}/ps/scale`, 'setProcessCount', {
            type: processType,
            qty: String(quantity)
        }), IgnoredBodySchema);
    }

    public async provisionAddon(app: string, addon: string): Promise<AddonResult> {
        const body = await requestJson(
            this.plain('POST', `/apps/${this.encode(app)}/addons/${this.encode(addon)}`, 'provisionAddon'),
            AddonResponseSchema
        );
        return { message: body.message ?? null };
    }

    public async getConfigVars(app: string): Promise<ConfigVars> {
        return await requestJson(this.plain('GET', `/apps/${this.encode(app)}/config_vars`, 'getConfigVars'), ConfigVarsSchema);
    }

    public async putConfigVars(app: string, vars: ConfigVars): Promise<void> {
        await requestJson({
            method: 'PUT',
            url: `${this.baseUrl}/apps/${this.encode(app)}/config_vars`,
            headers: { ...this.headers, 'Content-Type': 'application/json' },
            body: JSON.stringify(vars),
            timeoutMs: this.timeoutMs,
            operation: 'putConfigVars'
        }, IgnoredBodySchema);
    }

    private encode(segment: string): string {
        return encodeURIComponent(segment);
    }

    private plain(method: 'GET' | 'POST', path: string, operation: string) {
        return {
            method,
            url: `${this.baseUrl}${path}`,
            headers: this.headers,
            timeoutMs: this.timeoutMs,
            operation
        };
    }

    private form(method: 'POST', path: string, operation: string, fields: Record<string, string>) {
        return {
            ...this.plain(method, path, operation),
            headers: { ...this.headers, 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams(fields).toString()
        };
    }
}
