// src/core/saga/ForwardRegistry.ts

import { ErrorFactory } from '../errors';
import { ForwardReader, PayloadMap } from './types';

/**
 * ForwardRegistry
 * Append-only store of the payloads steps publish for steps enqueued after them.
 * One registry lives for exactly one executor run.
 *
 * The registry does not order anything: a consumer must be enqueued after
 * its producer has performed.
 */
export class ForwardRegistry<T extends PayloadMap> implements ForwardReader<T> {
    private readonly payloads: Partial<T> = {};
    private readonly order: Array<keyof T & string> = [];

    public record<K extends keyof T & string>(id: K, payload: T[K]): void {
        if (this.has(id)) {
            throw ErrorFactory.validation(`Forward payload for step "${id}" is already recorded`, {
                operation: 'ForwardRegistry.record',
                component: 'CORE_SAGA'
            });
        }
        this.payloads[id] = payload;
        this.order.push(id);
    }

    public has(id: keyof T & string): boolean {
        return Object.hasOwn(this.payloads, id);
    }

    public get<K extends keyof T & string>(id: K): T[K] | undefined {
        return this.payloads[id];
    }

    public require<K extends keyof T & string>(id: K): T[K] {
        const payload: T[K] | undefined = this.payloads[id];
        if (payload === undefined) {
            throw ErrorFactory.notFound(`No forward payload recorded for step "${id}"`, {
                operation: 'ForwardRegistry.require',
                suggestion: `Enqueue "${id}" before the steps that read its payload.`
            });
        }
        return payload;
    }

    /**
     * Step ids in the order their payloads were recorded.
     */
    public keys(): ReadonlyArray<keyof T & string> {
        return [...this.order];
    }
}
