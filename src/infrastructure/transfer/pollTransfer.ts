// src/infrastructure/transfer/pollTransfer.ts

import { CancellationGuard } from '../../core/saga/CancellationGuard';
import { Logger } from '../../core/logging/Logger';
import { TransferHandle, TransferService } from './types';

export interface PollOptions {
    intervalMs: number;
    /** Interrupts the wait between polls. Without one the wait is a plain timer. */
    guard?: CancellationGuard;
    onProgress?: (handle: TransferHandle) => void;
}

export function isTerminal(handle: TransferHandle): boolean {
    return handle.finishedAt !== null || handle.errorAt !== null;
}

/**
 * Polls a transfer at a fixed interval until the service reports it finished or failed.
 */
export async function pollTransfer(service: TransferService, initial: TransferHandle, options: PollOptions): Promise<TransferHandle> {
    const wait = (ms: number): Promise<void> =>
        options.guard ? options.guard.sleep(ms) : new Promise(r => setTimeout(r, ms));

    let handle = initial;
    let polls = 0;
    while (!isTerminal(handle)) {
        await wait(options.intervalMs);
        handle = await service.getTransfer(handle.id);
        polls++;
        options.onProgress?.(handle);
    }

    Logger.debug('pollTransfer', `Transfer ${handle.id} terminal after ${polls} polls`, {
        finishedAt: handle.finishedAt,
        errorAt: handle.errorAt
    });
    return handle;
}
