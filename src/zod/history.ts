// Zod schemas for history records and recorder configuration

import { z } from "zod";
import type { HistoryAction } from "../types/history";

/**
 * History action schema
 */
export const HistoryActionSchema: z.ZodType<HistoryAction> = z.enum([
  "Create",
  "Update",
  "Delete",
]);

/**
 * A stored history record. The snapshot is validated separately by the
 * recorder, against the schema of the entity type it stores.
 */
export const HistoryRecordSchema = z.object({
  id: z.string().uuid(),
  entityId: z.string().min(1),
  entityType: z.string().min(1),
  action: HistoryActionSchema,
  timestamp: z.number().int().nonnegative(),
  snapshot: z.unknown(),
  actor: z.string(),
});

export type StoredHistoryRecord = z.infer<typeof HistoryRecordSchema>;

export const HistoryRecordListSchema = z.array(HistoryRecordSchema);

/**
 * Serializable part of a recorder adapter configuration
 */
export const RecorderAdapterConfigSchema = z
  .object({
    type: z.string().min(1),
    connection: z.string().min(1).optional(),
    prefix: z
      .string()
      .regex(/^[a-zA-Z0-9_-]+$/, "prefix may only contain letters, digits, - and _")
      .optional(),
  })
  .passthrough();
