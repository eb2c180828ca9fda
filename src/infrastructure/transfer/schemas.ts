// src/infrastructure/transfer/schemas.ts

import { z } from 'zod';
import { TransferHandle } from './types';

const timestamp = z.string().nullable().optional();

export const TransferSchema = z.object({
    id: z.union([z.string(), z.number()]),
    log: z.string().nullable().optional(),
    progress: z.string().nullable().optional(),
    error_at: timestamp,
    finished_at: timestamp,
}).passthrough().transform((raw): TransferHandle => ({
    id: String(raw.id),
    log: raw.log ?? '',
    progress: raw.progress ?? null,
    errorAt: raw.error_at ?? null,
    finishedAt: raw.finished_at ?? null,
}));
