// src/infrastructure/transfer/types.ts

/**
 * State of a database-to-database copy as reported by the transfer service.
 * A transfer is terminal once `finishedAt` or `errorAt` is set.
 */
export interface TransferHandle {
    id: string;
    log: string;
    progress: string | null;
    errorAt: string | null;
    finishedAt: string | null;
}

export interface TransferEndpoint {
    url: string;
    name: string;
}

export interface TransferService {
    createTransfer(from: TransferEndpoint, to: TransferEndpoint): Promise<TransferHandle>;
    getTransfer(id: string): Promise<TransferHandle>;
}

/** Builds a client for the transfer-service URL discovered in the app's config. */
export type TransferServiceFactory = (serviceUrl: string) => TransferService;
