// History recorders - append-only stores of audited entity changes

import type {
  HistoryRecord,
  HistoryRecorder,
  NewHistoryRecord,
} from "../types/history";
import { HistoryActions } from "../types/history";
import type { Logger } from "../types/interceptor";
import { uuidv7 } from "../utils/uuid";

export interface HistoryRecorderOptions {
  /**
   * Clock used to timestamp records (Unix ms)
   * @default Date.now
   */
  clock?: () => number;

  /**
   * Receives a debug line per stored record
   * @default console
   */
  logger?: Logger;
}

/**
 * Sort records newest first. Records with the same timestamp keep reverse
 * insertion order.
 */
function newestFirst<T>(records: readonly HistoryRecord<T>[]): HistoryRecord<T>[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.timestamp - a.record.timestamp || b.index - a.index)
    .map((entry) => entry.record);
}

/**
 * Base class for recorders. Subclasses provide storage; the queries are
 * answered from the full record list.
 */
export abstract class BaseHistoryRecorder<T> implements HistoryRecorder<T> {
  protected readonly clock: () => number;
  protected readonly logger: Logger;

  constructor(options: HistoryRecorderOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? console;
  }

  /**
   * Persist one complete record
   */
  protected abstract append(record: HistoryRecord<T>): Promise<void>;

  /**
   * Every stored record, in insertion order
   */
  protected abstract readAll(): Promise<HistoryRecord<T>[]>;

  async add(record: NewHistoryRecord<T>): Promise<HistoryRecord<T>> {
    const stored: HistoryRecord<T> = {
      id: uuidv7(),
      entityId: record.entityId,
      entityType: record.entityType,
      action: record.action,
      timestamp: this.clock(),
      // Copied: later changes to the caller's object must not reach the record
      snapshot: structuredClone(record.snapshot),
      actor: record.actor,
    };
    await this.append(stored);
    this.logger.debug?.("History record stored", {
      id: stored.id,
      entityId: stored.entityId,
      entityType: stored.entityType,
      action: stored.action,
    });
    return stored;
  }

  async getAll(entityId: string): Promise<HistoryRecord<T>[]> {
    const records = await this.readAll();
    return newestFirst(records.filter((r) => r.entityId === entityId));
  }

  async getAtPointInTime(
    entityId: string,
    timestamp: number,
  ): Promise<T | undefined> {
    const records = await this.getAll(entityId);
    const latest = records.find((r) => r.timestamp <= timestamp);
    if (!latest || latest.action === HistoryActions.DELETE) {
      return undefined;
    }
    return latest.snapshot;
  }

  async getByDateRange(start: number, end: number): Promise<HistoryRecord<T>[]> {
    const records = await this.readAll();
    return newestFirst(
      records.filter((r) => r.timestamp >= start && r.timestamp <= end),
    );
  }

  async getLatest(entityId: string): Promise<HistoryRecord<T> | undefined> {
    const records = await this.getAll(entityId);
    return records[0];
  }
}

/**
 * In-memory recorder for tests and short-lived processes
 */
export class InMemoryHistoryRecorder<T> extends BaseHistoryRecorder<T> {
  private readonly records: HistoryRecord<T>[] = [];

  protected async append(record: HistoryRecord<T>): Promise<void> {
    this.records.push(record);
  }

  protected async readAll(): Promise<HistoryRecord<T>[]> {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }
}

export function createInMemoryHistoryRecorder<T>(
  options?: HistoryRecorderOptions,
): InMemoryHistoryRecorder<T> {
  return new InMemoryHistoryRecorder<T>(options);
}
