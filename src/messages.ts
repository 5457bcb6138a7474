/**
 * handoff — thread boundary schemas
 *
 * workerData going into an execution unit and messages coming back out are
 * structured-cloned, so both sides see `unknown`. These schemas turn them back
 * into typed values.
 */

import { z } from 'zod';

/** Any f64 the channel can carry. z.number() alone rejects NaN. */
const valueSchema = z.union([z.number(), z.nan()]);

// ─── Orchestrator → unit (workerData) ─────────────────────────────────────────

const channelOptionsSchema = z.object({
  faultOnInsert: z.number().int().positive().optional(),
  faultOnRemove: z.number().int().positive().optional(),
});

export const unitTaskSchema = z.discriminatedUnion('role', [
  z.object({
    role:           z.literal('producer'),
    channel:        z.instanceof(SharedArrayBuffer),
    source:         z.array(valueSchema),
    trace:          z.boolean(),
    channelOptions: channelOptionsSchema,
  }),
  z.object({
    role:           z.literal('consumer'),
    channel:        z.instanceof(SharedArrayBuffer),
    destination:    z.instanceof(SharedArrayBuffer),
    trace:          z.boolean(),
    channelOptions: channelOptionsSchema,
  }),
]);

export type UnitTask = z.infer<typeof unitTaskSchema>;

// ─── Unit → orchestrator (postMessage) ────────────────────────────────────────

const unitStateSchema = z.enum(['done', 'faulted', 'hung']);

export const producerReportSchema = z.object({
  state:        unitStateSchema,
  itemsSent:    z.number().int().nonnegative(),
  sentinelSent: z.boolean(),
  error:        z.string().optional(),
});

export const consumerReportSchema = z.object({
  state:             unitStateSchema,
  itemsReceived:     z.number().int().nonnegative(),
  sentinelsReceived: z.number().int().nonnegative(),
  error:             z.string().optional(),
});

export const unitMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type:    z.literal('log'),
    level:   z.enum(['debug', 'info', 'warn', 'error']),
    message: z.string(),
    fields:  z.record(z.union([z.string(), valueSchema, z.boolean()])).optional(),
  }),
  z.object({
    type:   z.literal('producer-report'),
    report: producerReportSchema,
  }),
  z.object({
    type:   z.literal('consumer-report'),
    report: consumerReportSchema,
  }),
]);

export type UnitMessage = z.infer<typeof unitMessageSchema>;
