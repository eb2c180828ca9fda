// src/infrastructure/platform/schemas.ts

import { z } from 'zod';

export const ProcessListSchema = z.array(z.object({
    process: z.string().min(1),
}).passthrough());

export const AddonResponseSchema = z.object({
    message: z.string().nullable().optional(),
}).passthrough();

export const ConfigVarsSchema = z.record(z.string());

// Mutating endpoints answer with assorted bodies nobody reads
export const IgnoredBodySchema = z.unknown();
