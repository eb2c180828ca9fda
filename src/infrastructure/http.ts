// src/infrastructure/http.ts

import { z } from 'zod';
import { ErrorFactory } from '../core/errors';
import { Logger } from '../core/logging/Logger';

export interface JsonRequest {
    method: 'GET' | 'POST' | 'PUT';
    url: string;
    headers: Record<string, string>;
    body?: string;
    timeoutMs: number;
    /** Names the call in errors and logs, e.g. 'setMaintenance'. */
    operation: string;
}

const ErrorBodySchema = z.object({ error: z.string() });

type JsonParse = { ok: true; value: unknown } | { ok: false; error: unknown };

function parseJson(text: string): JsonParse {
    try {
        return { ok: true, value: text.length > 0 ? JSON.parse(text) : {} };
    } catch (error) {
        return { ok: false, error };
    }
}

function errorMessage(status: number, text: string): string {
    const json = parseJson(text);
    if (json.ok) {
        const parsed = ErrorBodySchema.safeParse(json.value);
        if (parsed.success) return parsed.data.error;
    }
    return text.trim() || `HTTP ${status}`;
}

/**
 * Issues a request and validates the JSON answer against `schema`.
 * Non-2xx answers become PlatformApiError; transport failures and schema
 * mismatches become ExternalServiceError.
 */
export async function requestJson<S extends z.ZodTypeAny>(request: JsonRequest, schema: S): Promise<z.infer<S>> {
    Logger.debug('Http', `${request.method} ${request.url}`);

    let response: Response;
    try {
        response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: AbortSignal.timeout(request.timeoutMs)
        });
    } catch (error) {
        throw ErrorFactory.external(`${request.operation} request failed: ${error instanceof Error ? error.message : String(error)}`, {
            operation: request.operation,
            retryable: true,
            details: error
        });
    }

    const text = await response.text();
    if (!response.ok) {
        throw ErrorFactory.api(response.status, errorMessage(response.status, text), {
            operation: request.operation
        });
    }

    const json = parseJson(text);
    if (!json.ok) {
        throw ErrorFactory.external(`${request.operation} returned invalid JSON`, {
            operation: request.operation,
            details: text.slice(0, 200)
        });
    }

    const parsed = schema.safeParse(json.value);
    if (!parsed.success) {
        throw ErrorFactory.external(`${request.operation} returned an unexpected payload`, {
            operation: request.operation,
            details: parsed.error.issues
        });
    }
    return parsed.data;
}

export function basicAuth(user: string, password: string): string {
    return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}
