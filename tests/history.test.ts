// History interceptor tests

import { describe, it, expect, beforeEach } from "vitest";
import { InterceptorBuilder } from "../src/runtime/builder";
import { defineCapability } from "../src/runtime/proxy";
import { Metrics } from "../src/runtime/metrics";
import {
  HistoryInterceptor,
  historyInterceptor,
} from "../src/history/interceptor";
import { InMemoryHistoryRecorder } from "../src/history/recorder";
import { userContextFrom } from "../src/history/user-context";
import type { EntityRepository, HistoryRecorder } from "../src/types/history";
import { isUuidv7 } from "../src/utils/uuid";
import {
  InMemoryUserRepository,
  UserRepositoryCapability,
  UserSchema,
  createTestLogger,
  flushEvents,
  steppingClock,
} from "./fixtures";
import type { User } from "./fixtures";

describe("HistoryInterceptor", () => {
  let logger: ReturnType<typeof createTestLogger>;
  let recorder: InMemoryHistoryRecorder<User>;
  let repository: InMemoryUserRepository;
  let users: EntityRepository<User>;

  function intercepted(
    target: InMemoryUserRepository,
    sink: HistoryRecorder<User> = recorder,
  ): EntityRepository<User> {
    return new InterceptorBuilder(UserRepositoryCapability, { logger })
      .addInterceptor(
        new HistoryInterceptor(sink, { entityType: "User", entitySchema: UserSchema, logger }),
      )
      .build(target);
  }

  beforeEach(() => {
    logger = createTestLogger();
    recorder = new InMemoryHistoryRecorder<User>({ clock: steppingClock(), logger });
    repository = new InMemoryUserRepository();
    users = intercepted(repository);
  });

  describe("recording", () => {
    it("records the created entity on add", async () => {
      await users.add({ id: "u1", name: "Ada" });

      const [record] = await recorder.getAll("u1");
      expect(record).toEqual({
        id: expect.any(String),
        entityId: "u1",
        entityType: "User",
        action: "Create",
        timestamp: 1000,
        snapshot: { id: "u1", name: "Ada" },
        actor: "System",
      });
      expect(isUuidv7(record?.id ?? "")).toBe(true);
    });

    it("records the state before an update", async () => {
      await users.add({ id: "u1", name: "A" });
      await users.update({ id: "u1", name: "B" });

      const records = await recorder.getAll("u1");
      expect(records.map((r) => [r.action, r.timestamp])).toEqual([
        ["Update", 2000],
        ["Create", 1000],
      ]);
      expect(records.map((r) => r.snapshot.name)).toEqual(["A", "A"]);
      expect(await repository.getById("u1")).toEqual({ id: "u1", name: "B" });
    });

    it("records the state before a removal as Delete", async () => {
      await users.add({ id: "u1", name: "A" });
      await users.update({ id: "u1", name: "B" });
      await users.remove("u1");

      const latest = await recorder.getLatest("u1");
      expect(latest).toMatchObject({
        action: "Delete",
        timestamp: 3000,
        snapshot: { id: "u1", name: "B" },
      });
    });

    it("answers point-in-time queries from the recorded snapshots", async () => {
      await users.add({ id: "u1", name: "A" });
      await users.update({ id: "u1", name: "B" });
      await users.remove("u1");

      expect(await recorder.getAtPointInTime("u1", 500)).toBeUndefined();
      expect(await recorder.getAtPointInTime("u1", 1500)).toEqual({ id: "u1", name: "A" });
      expect(await recorder.getAtPointInTime("u1", 2500)).toEqual({ id: "u1", name: "A" });
      expect(await recorder.getAtPointInTime("u1", 3000)).toBeUndefined();
    });

    it("looks up the prior state on the target, not through the proxy", async () => {
      await users.add({ id: "u1", name: "A" });
      await users.update({ id: "u1", name: "B" });

      expect(repository.lookups).toBe(1);
    });

    it("does not record reads", async () => {
      await users.add({ id: "u1", name: "A" });
      await users.getById("u1");
      await users.getAll();

      expect(recorder.size).toBe(1);
    });

    it("records the actor from the user context", async () => {
      const named = new InterceptorBuilder(UserRepositoryCapability, { logger })
        .addInterceptor(
          historyInterceptor(recorder, {
            entityType: "User",
            entitySchema: UserSchema,
            userContext: userContextFrom(() => "alice"),
            logger,
          }),
        )
        .build(repository);

      await named.add({ id: "u2", name: "Grace" });

      expect((await recorder.getLatest("u2"))?.actor).toBe("alice");
    });

    it("keeps snapshots independent of later changes to the entity", async () => {
      const user: User = { id: "u1", name: "A" };
      await users.add(user);
      user.name = "changed";

      expect((await recorder.getLatest("u1"))?.snapshot.name).toBe("A");
    });
  });

  describe("failures", () => {
    it("does not fail the call when the recorder rejects", async () => {
      const failing: HistoryRecorder<User> = {
        add: () => Promise.reject(new Error("disk full")),
        getAll: async () => [],
        getAtPointInTime: async () => undefined,
        getByDateRange: async () => [],
        getLatest: async () => undefined,
      };
      const withFailingSink = intercepted(repository, failing);

      await expect(withFailingSink.add({ id: "u1", name: "A" })).resolves.toEqual({
        id: "u1",
        name: "A",
      });
      expect(logger.error).toHaveBeenCalledWith("History: failed to record change", {
        callId: expect.any(String),
        entityType: "User",
        entityId: "u1",
        action: "Create",
        error: "disk full",
      });
    });

    it("lets the update proceed when the lookup throws", async () => {
      class BrokenLookupRepository extends InMemoryUserRepository {
        override async getById(): Promise<User | undefined> {
          throw new Error("lookup down");
        }
      }
      const broken = new BrokenLookupRepository();
      const brokenUsers = intercepted(broken);
      await brokenUsers.add({ id: "u1", name: "A" });

      await expect(brokenUsers.update({ id: "u1", name: "B" })).resolves.toEqual({
        id: "u1",
        name: "B",
      });
      expect(logger.warn).toHaveBeenCalledWith("History: failed to capture state before call", {
        callId: expect.any(String),
        entityType: "User",
        operation: "update",
        error: "lookup down",
      });
      expect(recorder.size).toBe(1);
    });

    it("records nothing when the entity does not exist", async () => {
      await expect(users.update({ id: "u9", name: "Nobody" })).rejects.toThrow(
        "User u9 not found",
      );

      expect(logger.warn).toHaveBeenCalledWith("History: no current state found", {
        callId: expect.any(String),
        entityType: "User",
        entityId: "u9",
      });
      expect(recorder.size).toBe(0);
    });

    it("records nothing when the operation fails", async () => {
      await users.add({ id: "u1", name: "A" });

      await expect(users.add({ id: "u1", name: "again" })).rejects.toThrow(
        "User u1 already exists",
      );
      expect(recorder.size).toBe(1);
    });
  });

  describe("scope", () => {
    it("passes through synchronous operations of other targets", () => {
      interface Catalog {
        add(item: string): number;
      }
      class ListCatalog implements Catalog {
        private readonly items: string[] = [];
        add(item: string): number {
          this.items.push(item);
          return this.items.length;
        }
      }
      const catalog = new InterceptorBuilder(
        defineCapability<Catalog>("Catalog", { add: "sync" }),
        { logger },
      )
        .addInterceptor(
          new HistoryInterceptor(recorder, { entityType: "User", entitySchema: UserSchema, logger }),
        )
        .build(new ListCatalog());

      expect(catalog.add("book")).toBe(1);
      expect(recorder.size).toBe(0);
      expect(logger.error).not.toHaveBeenCalled();
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("maps custom operation names", async () => {
      interface Directory {
        find(id: string): Promise<User | undefined>;
        insert(user: User): Promise<User>;
        save(user: User): Promise<User>;
        drop(id: string): Promise<void>;
      }
      class MapDirectory implements Directory {
        private readonly entries = new Map<string, User>();
        async find(id: string): Promise<User | undefined> {
          return this.entries.get(id);
        }
        async insert(user: User): Promise<User> {
          this.entries.set(user.id, { ...user });
          return user;
        }
        async save(user: User): Promise<User> {
          this.entries.set(user.id, { ...user });
          return user;
        }
        async drop(id: string): Promise<void> {
          this.entries.delete(id);
        }
      }
      const directory = new InterceptorBuilder(
        defineCapability<Directory>("Directory", {
          find: "async",
          insert: "async",
          save: "async",
          drop: "async",
        }),
        { logger },
      )
        .addInterceptor(
          new HistoryInterceptor(recorder, {
            entityType: "User",
            entitySchema: UserSchema,
            logger,
            operations: { add: "insert", update: "save", remove: "drop", getById: "find" },
          }),
        )
        .build(new MapDirectory());

      await directory.insert({ id: "u1", name: "A" });
      await directory.save({ id: "u1", name: "B" });
      await directory.drop("u1");

      const records = await recorder.getAll("u1");
      expect(records.map((r) => [r.action, r.snapshot.name])).toEqual([
        ["Delete", "B"],
        ["Update", "A"],
        ["Create", "A"],
      ]);
    });
  });

  describe("synchronous repositories", () => {
    interface UserStore {
      getById(id: string): User | undefined;
      add(user: User): User;
      update(user: User): User;
      remove(id: string): void;
    }

    class MapUserStore implements UserStore {
      private readonly users = new Map<string, User>();

      getById(id: string): User | undefined {
        return this.users.get(id);
      }

      add(user: User): User {
        this.users.set(user.id, { ...user });
        return user;
      }

      update(user: User): User {
        if (!this.users.has(user.id)) throw new Error(`User ${user.id} not found`);
        this.users.set(user.id, { ...user });
        return user;
      }

      remove(id: string): void {
        this.users.delete(id);
      }
    }

    const UserStoreCapability = defineCapability<UserStore>("UserStore", {
      getById: "sync",
      add: "sync",
      update: "sync",
      remove: "sync",
    });

    function interceptedStore(
      target: UserStore,
      sink: HistoryRecorder<User> = recorder,
      metrics = new Metrics(),
    ): UserStore {
      return new InterceptorBuilder(UserStoreCapability, { logger, metrics })
        .addInterceptor(
          new HistoryInterceptor(sink, { entityType: "User", entitySchema: UserSchema, logger }),
        )
        .build(target);
    }

    it("records add, update and remove without failing the calls", async () => {
      const metrics = new Metrics();
      const store = interceptedStore(new MapUserStore(), recorder, metrics);

      expect(store.add({ id: "u1", name: "A" })).toEqual({ id: "u1", name: "A" });
      expect(store.update({ id: "u1", name: "B" })).toEqual({ id: "u1", name: "B" });
      expect(store.remove("u1")).toBeUndefined();
      await flushEvents();

      const records = await recorder.getAll("u1");
      expect(records.map((r) => [r.action, r.snapshot.name, r.timestamp])).toEqual([
        ["Delete", "B", 3000],
        ["Update", "A", 2000],
        ["Create", "A", 1000],
      ]);
      expect(metrics.hookErrors).toBe(0);
      expect(logger.error).not.toHaveBeenCalled();
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("applies the update when the store's lookup is asynchronous", async () => {
      interface LaggingStore {
        getById(id: string): Promise<User | undefined>;
        update(user: User): User;
      }
      class MapLaggingStore implements LaggingStore {
        readonly users = new Map<string, User>([["u1", { id: "u1", name: "A" }]]);
        lookups = 0;
        getById(id: string): Promise<User | undefined> {
          this.lookups++;
          return Promise.resolve(this.users.get(id));
        }
        update(user: User): User {
          this.users.set(user.id, { ...user });
          return user;
        }
      }
      const target = new MapLaggingStore();
      const metrics = new Metrics();
      const store = new InterceptorBuilder(
        defineCapability<LaggingStore>("LaggingStore", { getById: "async", update: "sync" }),
        { logger, metrics },
      )
        .addInterceptor(
          new HistoryInterceptor(recorder, { entityType: "User", entitySchema: UserSchema, logger }),
        )
        .build(target);

      expect(store.update({ id: "u1", name: "B" })).toEqual({ id: "u1", name: "B" });
      await flushEvents();

      expect(target.users.get("u1")).toEqual({ id: "u1", name: "B" });
      expect(target.lookups).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "History: lookup is asynchronous, prior state skipped",
        { callId: expect.any(String), entityType: "User", operation: "update" },
      );
      expect(recorder.size).toBe(0);
      expect(metrics.hookErrors).toBe(0);
    });

    it("logs a recorder failure after the call has returned", async () => {
      const failing: HistoryRecorder<User> = {
        add: () => Promise.reject(new Error("disk full")),
        getAll: async () => [],
        getAtPointInTime: async () => undefined,
        getByDateRange: async () => [],
        getLatest: async () => undefined,
      };
      const metrics = new Metrics();
      const store = interceptedStore(new MapUserStore(), failing, metrics);

      expect(store.add({ id: "u1", name: "A" })).toEqual({ id: "u1", name: "A" });
      await flushEvents();

      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith("History: failed to record change", {
        callId: expect.any(String),
        entityType: "User",
        entityId: "u1",
        action: "Create",
        error: "disk full",
      });
      expect(metrics.hookErrors).toBe(0);
    });
  });
});
