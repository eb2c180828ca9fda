// tests/support/FakeTransferService.ts

import { TransferEndpoint, TransferHandle, TransferService } from '../../src/infrastructure/transfer/types';

export function transferHandle(overrides: Partial<TransferHandle> = {}): TransferHandle {
    return {
        id: 'transfer-1',
        log: '',
        progress: null,
        errorAt: null,
        finishedAt: null,
        ...overrides
    };
}

/**
 * Returns scripted states from getTransfer, one per poll; the last state repeats.
 */
export class FakeTransferService implements TransferService {
    public readonly created: Array<{ from: TransferEndpoint; to: TransferEndpoint }> = [];
    public polls = 0;

    constructor(private readonly script: TransferHandle[]) { }

    public async createTransfer(from: TransferEndpoint, to: TransferEndpoint): Promise<TransferHandle> {
        this.created.push({ from, to });
        return transferHandle();
    }

    public async getTransfer(id: string): Promise<TransferHandle> {
        this.polls++;
        const next = this.script.length > 1 ? this.script.shift() : this.script[0];
        return { ...(next ?? transferHandle({ finishedAt: '2026-01-01T00:00:00Z' })), id };
    }
}
