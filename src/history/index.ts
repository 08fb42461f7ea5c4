// History tracking: interceptor, recorders and storage adapters

export {
  HistoryInterceptor,
  historyInterceptor,
  HISTORY_SNAPSHOT_KEY,
} from "./interceptor";
export type {
  HistoryInterceptorOptions,
  HistoryOperationNames,
} from "./interceptor";

export {
  BaseHistoryRecorder,
  InMemoryHistoryRecorder,
  createInMemoryHistoryRecorder,
} from "./recorder";
export type { HistoryRecorderOptions } from "./recorder";

export {
  FileHistoryRecorder,
  registerRecorderAdapter,
  unregisterRecorderAdapter,
  getRegisteredRecorderAdapters,
  createHistoryRecorder,
} from "./storageAdapters";
export type {
  FileHistoryRecorderOptions,
  RecorderAdapterConfig,
  RecorderAdapterFactory,
} from "./storageAdapters";

export { DefaultUserContextAccessor, userContextFrom } from "./user-context";
