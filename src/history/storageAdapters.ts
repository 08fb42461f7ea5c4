// Storage adapters for history recorders
//
// Pluggable backends for history records. Extend BaseHistoryRecorder to
// create custom adapters and register them by type.

import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import type { ZodType, ZodTypeDef } from "zod";
import type { HistoryRecord, HistoryRecorder } from "../types/history";
import {
  HistoryRecordListSchema,
  RecorderAdapterConfigSchema,
} from "../zod/history";
import { ArgumentError, InterposeErrorCodes } from "../utils/errors";
import { BaseHistoryRecorder, InMemoryHistoryRecorder } from "./recorder";
import type { HistoryRecorderOptions } from "./recorder";

/**
 * Recorder adapter configuration
 */
export interface RecorderAdapterConfig<T> extends HistoryRecorderOptions {
  /** Adapter type identifier */
  type: string;
  /** Connection string or location (the directory, for "file") */
  connection?: string;
  /** Table/file/key prefix (the entity type name, for "file") */
  prefix?: string;
  /** Validates snapshots read back from storage */
  snapshotSchema?: ZodType<T, ZodTypeDef, unknown>;
  /** Custom options passed to the adapter */
  options?: Record<string, unknown>;
}

/**
 * Factory function type for creating recorders
 */
export type RecorderAdapterFactory = <T>(
  config: RecorderAdapterConfig<T>,
) => HistoryRecorder<T> | Promise<HistoryRecorder<T>>;

const adapterRegistry = new Map<string, RecorderAdapterFactory>();

/**
 * Register a recorder adapter factory
 *
 * @example
 * ```typescript
 * registerRecorderAdapter("postgres", (config) =>
 *   new PostgresHistoryRecorder(config.connection, config.options),
 * );
 *
 * const recorder = await createHistoryRecorder({
 *   type: "postgres",
 *   connection: "postgres://localhost/audit",
 * });
 * ```
 */
export function registerRecorderAdapter(
  type: string,
  factory: RecorderAdapterFactory,
): void {
  adapterRegistry.set(type, factory);
}

export function unregisterRecorderAdapter(type: string): boolean {
  return adapterRegistry.delete(type);
}

export function getRegisteredRecorderAdapters(): string[] {
  return Array.from(adapterRegistry.keys());
}

/**
 * Create a recorder using a registered adapter
 *
 * @throws ArgumentError (UNKNOWN_ADAPTER) if no adapter is registered for
 *   `config.type`, or (INVALID_ARGUMENT) if the config is malformed
 */
export async function createHistoryRecorder<T>(
  config: RecorderAdapterConfig<T>,
): Promise<HistoryRecorder<T>> {
  const parsed = RecorderAdapterConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ArgumentError(
      `Invalid recorder adapter config: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ")}`,
    );
  }

  const factory = adapterRegistry.get(config.type);
  if (!factory) {
    const available = getRegisteredRecorderAdapters().join(", ") || "none";
    throw new ArgumentError(
      `Unknown recorder adapter type: "${config.type}". Available adapters: ${available}`,
      InterposeErrorCodes.UNKNOWN_ADAPTER,
      { type: config.type },
    );
  }

  return factory(config);
}

export interface FileHistoryRecorderOptions<T> extends HistoryRecorderOptions {
  /**
   * Directory holding the record files
   * @default "./history"
   */
  basePath?: string;

  /** Records are stored in `<entityType>.json` */
  entityType: string;

  snapshotSchema: ZodType<T, ZodTypeDef, unknown>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * File-based recorder. Keeps every record of one entity type in a JSON
 * file; records are validated when read back.
 *
 * Writes are queued so concurrent adds do not overwrite each other.
 */
export class FileHistoryRecorder<T> extends BaseHistoryRecorder<T> {
  readonly basePath: string;
  readonly filePath: string;
  private readonly snapshotSchema: ZodType<T, ZodTypeDef, unknown>;
  private ready: Promise<void> | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: FileHistoryRecorderOptions<T>) {
    super(options);
    this.basePath = options.basePath ?? "./history";
    this.filePath = join(
      this.basePath,
      `${FileHistoryRecorder.validateName(options.entityType)}.json`,
    );
    this.snapshotSchema = options.snapshotSchema;
  }

  /**
   * Validate a file name segment: letters, digits, hyphens and underscores
   * only.
   * @throws ArgumentError on any other character
   */
  static validateName(name: string): string {
    if (!/^[a-zA-Z0-9_-]+$/.test(name)) {
      throw new ArgumentError(
        `Invalid entity type name "${name}": only alphanumeric characters, hyphens, and underscores are allowed`,
      );
    }
    return name;
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.basePath, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = undefined;
          throw error;
        },
      );
    }
    return this.ready;
  }

  /**
   * Run `task` after every queued file operation
   */
  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.queue.then(task);
    // The failure reaches the caller through `run`; the queue moves on
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<HistoryRecord<T>[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const stored = HistoryRecordListSchema.parse(JSON.parse(content));
    return stored.map((record) => ({
      ...record,
      snapshot: this.snapshotSchema.parse(record.snapshot),
    }));
  }

  protected append(record: HistoryRecord<T>): Promise<void> {
    return this.enqueue(async () => {
      await this.ensureDir();
      const records = await this.load();
      records.push(record);
      await writeFile(this.filePath, JSON.stringify(records, null, 2), "utf-8");
    });
  }

  protected readAll(): Promise<HistoryRecord<T>[]> {
    return this.enqueue(() => this.load());
  }
}

// Built-in adapters
registerRecorderAdapter(
  "memory",
  <T>(config: RecorderAdapterConfig<T>) => new InMemoryHistoryRecorder<T>(config),
);

registerRecorderAdapter("file", <T>(config: RecorderAdapterConfig<T>) => {
  if (!config.snapshotSchema) {
    throw new ArgumentError('The "file" recorder adapter requires a snapshotSchema');
  }
  if (!config.prefix) {
    throw new ArgumentError(
      'The "file" recorder adapter requires a prefix (the entity type name)',
    );
  }
  return new FileHistoryRecorder<T>({
    basePath: config.connection,
    entityType: config.prefix,
    snapshotSchema: config.snapshotSchema,
    clock: config.clock,
    logger: config.logger,
  });
});
