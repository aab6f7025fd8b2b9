/**
 * @file Dispatch Request Schemas
 *
 * Zod runtime schemas for requests entering the dispatcher. Every
 * request is validated here before it reaches the log or the checker.
 *
 * Usage:
 *   const result = DispatchRequestSchema.safeParse(raw);
 *   if (!result.success) { ... return error response ... }
 *
 * @module dispatch/schemas
 */

import { z } from 'zod';

// ─── Individual request schemas ──────────────────────────────────────────────

export const RecordRequestSchema = z.object({
    op:   z.literal('record'),
    text: z.string()
});

export const HistoryRequestSchema = z.object({
    op: z.literal('history')
});

export const RecallRequestSchema = z.object({
    op:    z.literal('recall'),
    query: z.string()
});

export const FingerprintRequestSchema = z.object({
    op:   z.literal('fingerprint'),
    text: z.string()
});

export const VerifyRequestSchema = z.object({
    op:        z.literal('verify'),
    text:      z.string(),
    signature: z.string()
});

export const ConsolidateRequestSchema = z.object({
    op: z.literal('consolidate')
});

export const HelpRequestSchema = z.object({
    op: z.literal('help')
});

// ─── Union ───────────────────────────────────────────────────────────────────

export const DispatchRequestSchema = z.discriminatedUnion('op', [
    RecordRequestSchema,
    HistoryRequestSchema,
    RecallRequestSchema,
    FingerprintRequestSchema,
    VerifyRequestSchema,
    ConsolidateRequestSchema,
    HelpRequestSchema
]);

export type DispatchRequest = z.infer<typeof DispatchRequestSchema>;
