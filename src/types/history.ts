// History tracking types

/**
 * Entities tracked by history need a stable string identifier.
 */
export interface BaseEntity {
  id: string;
}

export const HistoryActions = {
  CREATE: "Create",
  UPDATE: "Update",
  DELETE: "Delete",
} as const;

export type HistoryAction = (typeof HistoryActions)[keyof typeof HistoryActions];

/**
 * Append-only record of one audited call.
 */
export interface HistoryRecord<T> {
  /** UUID v7 */
  id: string;
  entityId: string;
  entityType: string;
  action: HistoryAction;
  /** Unix ms */
  timestamp: number;
  snapshot: T;
  actor: string;
}

/**
 * Input to HistoryRecorder.add(); id and timestamp are assigned by the recorder.
 */
export type NewHistoryRecord<T> = Omit<HistoryRecord<T>, "id" | "timestamp">;

/**
 * Recorder capability - the sink history records are written to.
 */
export interface HistoryRecorder<T> {
  add(record: NewHistoryRecord<T>): Promise<HistoryRecord<T>>;

  /**
   * All records of an entity, newest first
   */
  getAll(entityId: string): Promise<HistoryRecord<T>[]>;

  /**
   * State of an entity at `timestamp`, taken from the latest record at or
   * before it. A Delete record means the entity did not exist.
   */
  getAtPointInTime(entityId: string, timestamp: number): Promise<T | undefined>;

  /**
   * Records of all entities with start <= timestamp <= end, newest first
   */
  getByDateRange(start: number, end: number): Promise<HistoryRecord<T>[]>;

  getLatest(entityId: string): Promise<HistoryRecord<T> | undefined>;
}

/**
 * Supplies the actor recorded on history records.
 */
export interface UserContextAccessor {
  getCurrentUsername(): string;
}

/**
 * Repository capability the history interceptor understands.
 */
export interface EntityRepository<T extends BaseEntity> {
  getById(id: string, signal?: AbortSignal): Promise<T | undefined>;
  getAll(signal?: AbortSignal): Promise<T[]>;
  add(entity: T, signal?: AbortSignal): Promise<T>;
  update(entity: T, signal?: AbortSignal): Promise<T>;
  remove(id: string, signal?: AbortSignal): Promise<void>;
}
