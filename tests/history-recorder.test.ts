// History recorder and storage adapter tests

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ZodError } from "zod";
import {
  InMemoryHistoryRecorder,
  createInMemoryHistoryRecorder,
} from "../src/history/recorder";
import {
  FileHistoryRecorder,
  createHistoryRecorder,
  getRegisteredRecorderAdapters,
  registerRecorderAdapter,
  unregisterRecorderAdapter,
} from "../src/history/storageAdapters";
import type { RecorderAdapterConfig } from "../src/history/storageAdapters";
import type { NewHistoryRecord } from "../src/types/history";
import { ArgumentError, InterposeErrorCodes } from "../src/utils/errors";
import { UserSchema, createTestLogger, steppingClock } from "./fixtures";
import type { User } from "./fixtures";

function change(
  entityId: string,
  name: string,
  action: NewHistoryRecord<User>["action"] = "Create",
): NewHistoryRecord<User> {
  return {
    entityId,
    entityType: "User",
    action,
    actor: "System",
    snapshot: { id: entityId, name },
  };
}

describe("InMemoryHistoryRecorder", () => {
  it("assigns id and timestamp and logs each stored record", async () => {
    const logger = createTestLogger();
    const recorder = new InMemoryHistoryRecorder<User>({ clock: () => 42, logger });

    const stored = await recorder.add(change("u1", "A"));

    expect(stored).toMatchObject({ entityId: "u1", timestamp: 42, action: "Create" });
    expect(logger.debug).toHaveBeenCalledWith("History record stored", {
      id: stored.id,
      entityId: "u1",
      entityType: "User",
      action: "Create",
    });
  });

  it("returns an entity's records newest first", async () => {
    const recorder = createInMemoryHistoryRecorder<User>({
      clock: steppingClock(),
      logger: createTestLogger(),
    });
    await recorder.add(change("u1", "A"));
    await recorder.add(change("u2", "other"));
    await recorder.add(change("u1", "B", "Update"));

    const records = await recorder.getAll("u1");

    expect(records.map((r) => [r.snapshot.name, r.timestamp])).toEqual([
      ["B", 3000],
      ["A", 1000],
    ]);
  });

  it("orders records with equal timestamps by reverse insertion", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({
      clock: () => 5000,
      logger: createTestLogger(),
    });
    await recorder.add(change("u1", "first"));
    await recorder.add(change("u1", "second", "Update"));

    expect((await recorder.getLatest("u1"))?.snapshot.name).toBe("second");
    expect(await recorder.getAtPointInTime("u1", 5000)).toEqual({ id: "u1", name: "second" });
  });

  it("returns records of every entity within an inclusive range", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({
      clock: steppingClock(),
      logger: createTestLogger(),
    });
    await recorder.add(change("u1", "A"));
    await recorder.add(change("u2", "B"));
    await recorder.add(change("u1", "C", "Update"));

    const records = await recorder.getByDateRange(1000, 2000);

    expect(records.map((r) => [r.entityId, r.timestamp])).toEqual([
      ["u2", 2000],
      ["u1", 1000],
    ]);
    expect(await recorder.getByDateRange(4000, 5000)).toEqual([]);
  });

  it("treats a Delete record as absence", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({
      clock: steppingClock(),
      logger: createTestLogger(),
    });
    await recorder.add(change("u1", "A"));
    await recorder.add(change("u1", "A", "Delete"));
    await recorder.add(change("u1", "again"));

    expect(await recorder.getAtPointInTime("u1", 1000)).toEqual({ id: "u1", name: "A" });
    expect(await recorder.getAtPointInTime("u1", 2999)).toBeUndefined();
    expect(await recorder.getAtPointInTime("u1", 3000)).toEqual({ id: "u1", name: "again" });
  });

  it("returns nothing for unknown entities", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({ logger: createTestLogger() });

    expect(await recorder.getAll("missing")).toEqual([]);
    expect(await recorder.getLatest("missing")).toBeUndefined();
    expect(await recorder.getAtPointInTime("missing", Date.now())).toBeUndefined();
  });

  it("copies snapshots on add", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({ logger: createTestLogger() });
    const record = change("u1", "A");
    await recorder.add(record);
    record.snapshot.name = "mutated";

    expect((await recorder.getLatest("u1"))?.snapshot.name).toBe("A");
  });

  it("clears its records", async () => {
    const recorder = new InMemoryHistoryRecorder<User>({ logger: createTestLogger() });
    await recorder.add(change("u1", "A"));
    recorder.clear();

    expect(recorder.size).toBe(0);
  });
});

describe("FileHistoryRecorder", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "interpose-history-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function fileRecorder(basePath = dir): FileHistoryRecorder<User> {
    return new FileHistoryRecorder<User>({
      basePath,
      entityType: "User",
      snapshotSchema: UserSchema,
      clock: steppingClock(),
      logger: createTestLogger(),
    });
  }

  it("stores records in <entityType>.json", async () => {
    const recorder = fileRecorder();
    const stored = await recorder.add(change("u1", "A"));

    expect(recorder.filePath).toBe(join(dir, "User.json"));
    const content: unknown = JSON.parse(await readFile(recorder.filePath, "utf-8"));
    expect(content).toEqual([stored]);
  });

  it("reads records written by another instance", async () => {
    await fileRecorder().add(change("u1", "A"));

    const records = await fileRecorder().getAll("u1");

    expect(records).toHaveLength(1);
    expect(records[0]?.snapshot).toEqual({ id: "u1", name: "A" });
  });

  it("returns no records before the first write", async () => {
    expect(await fileRecorder().getAll("u1")).toEqual([]);
  });

  it("creates missing directories", async () => {
    const recorder = fileRecorder(join(dir, "nested", "deeper"));
    await recorder.add(change("u1", "A"));

    expect(await recorder.getLatest("u1")).toMatchObject({ entityId: "u1" });
  });

  it("keeps every record of concurrent adds", async () => {
    const recorder = fileRecorder();

    await Promise.all(["a", "b", "c", "d", "e"].map((name) => recorder.add(change("u1", name))));

    expect(await recorder.getAll("u1")).toHaveLength(5);
  });

  it("rejects snapshots that do not match the schema", async () => {
    await writeFile(
      join(dir, "User.json"),
      JSON.stringify([
        {
          id: "01890a5d-ac96-774b-bcce-b302099a8057",
          entityId: "u1",
          entityType: "User",
          action: "Create",
          timestamp: 1,
          snapshot: { id: "u1" },
          actor: "System",
        },
      ]),
      "utf-8",
    );

    await expect(fileRecorder().getAll("u1")).rejects.toBeInstanceOf(ZodError);
  });

  it("rejects entity type names that are not safe file names", () => {
    expect(
      () =>
        new FileHistoryRecorder<User>({
          basePath: dir,
          entityType: "../User",
          snapshotSchema: UserSchema,
        }),
    ).toThrow(
      'Invalid entity type name "../User": only alphanumeric characters, hyphens, and underscores are allowed',
    );
  });
});

describe("recorder adapter registry", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "interpose-adapters-"));
  });

  afterEach(async () => {
    unregisterRecorderAdapter("custom");
    await rm(dir, { recursive: true, force: true });
  });

  it("registers the built-in adapters", () => {
    expect(getRegisteredRecorderAdapters()).toEqual(
      expect.arrayContaining(["memory", "file"]),
    );
  });

  it("creates a memory recorder", async () => {
    const recorder = await createHistoryRecorder<User>({ type: "memory" });

    expect(recorder).toBeInstanceOf(InMemoryHistoryRecorder);
  });

  it("creates a file recorder from connection and prefix", async () => {
    const recorder = await createHistoryRecorder<User>({
      type: "file",
      connection: dir,
      prefix: "User",
      snapshotSchema: UserSchema,
    });

    expect(recorder).toBeInstanceOf(FileHistoryRecorder);
    expect(recorder instanceof FileHistoryRecorder && recorder.filePath).toBe(
      join(dir, "User.json"),
    );
  });

  it("requires a snapshot schema and a prefix for file recorders", async () => {
    await expect(createHistoryRecorder<User>({ type: "file", prefix: "User" })).rejects.toThrow(
      'The "file" recorder adapter requires a snapshotSchema',
    );
    await expect(
      createHistoryRecorder<User>({ type: "file", snapshotSchema: UserSchema }),
    ).rejects.toThrow('The "file" recorder adapter requires a prefix (the entity type name)');
  });

  it("rejects malformed configs", async () => {
    await expect(createHistoryRecorder<User>({ type: "memory", prefix: "a/b" })).rejects.toThrow(
      "Invalid recorder adapter config: prefix: prefix may only contain letters, digits, - and _",
    );
  });

  it("rejects unknown adapter types", async () => {
    const error: unknown = await createHistoryRecorder<User>({ type: "redis" }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toMatchObject({
      code: InterposeErrorCodes.UNKNOWN_ADAPTER,
      context: { metadata: { type: "redis" } },
    });
    expect(error instanceof Error && error.message).toMatch(
      /^Unknown recorder adapter type: "redis"\. Available adapters: .*memory/,
    );
  });

  it("creates recorders from custom adapters", async () => {
    const seen: Array<Record<string, unknown> | undefined> = [];
    registerRecorderAdapter("custom", <T>(config: RecorderAdapterConfig<T>) => {
      seen.push(config.options);
      return new InMemoryHistoryRecorder<T>(config);
    });

    const recorder = await createHistoryRecorder<User>({
      type: "custom",
      options: { region: "eu" },
    });

    expect(recorder).toBeInstanceOf(InMemoryHistoryRecorder);
    expect(seen).toEqual([{ region: "eu" }]);
    expect(unregisterRecorderAdapter("custom")).toBe(true);
  });
});
