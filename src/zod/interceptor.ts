// Zod schemas for interception contracts

import { z } from "zod";
import type { OperationDescriptor, OperationKind } from "../types/interceptor";

/**
 * Operation kind schema
 */
export const OperationKindSchema: z.ZodType<OperationKind> = z.enum([
  "sync",
  "async",
]);

/**
 * Operation descriptor schema
 */
export const OperationDescriptorSchema: z.ZodType<OperationDescriptor> =
  z.object({
    capability: z.string().min(1),
    name: z.string().min(1),
    kind: OperationKindSchema,
  });
