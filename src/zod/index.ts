// interpose/zod - Zod schemas for history records and recorder configuration

export {
  HistoryActionSchema,
  HistoryRecordSchema,
  HistoryRecordListSchema,
  RecorderAdapterConfigSchema,
} from "./history";
export type { StoredHistoryRecord } from "./history";

export { OperationDescriptorSchema, OperationKindSchema } from "./interceptor";
