import { describe, expect, it } from "vitest";

import type { Repositories } from "../src/db/repositories.js";
import type { BoundSession, SessionDriver, SessionState } from "../src/db/session-context.js";
import type { IdentityContext } from "../src/platform/request-context.js";

import { MemoryConnection, MemoryDatabase } from "../src/db/memory/memory-database.js";
import { MemorySessionDriver } from "../src/db/memory/memory-session-driver.js";
import { SessionContextPropagator, SessionStateMachine } from "../src/db/session-context.js";
import { createIdentityContext } from "../src/platform/request-context.js";
import { createServices } from "../src/platform/services.js";
import { InternalFailureError, UnauthenticatedError } from "../src/shared/errors.js";
import { ALICE, BOB, createTestLogger } from "./support.js";

type FakeConnection = { id: number; identity: string | null };

class RecordingDriver implements SessionDriver<FakeConnection> {
  readonly calls: string[] = [];
  readonly released: Array<{ id: number; destroy: boolean }> = [];
  failRollback = false;
  failReset = false;
  private nextId = 1;

  async acquire(): Promise<FakeConnection> {
    this.calls.push("acquire");
    return { id: this.nextId++, identity: null };
  }

  async bind(connection: FakeConnection, identity: IdentityContext) {
    this.calls.push(`bind:${identity.identityId}`);
    connection.identity = identity.identityId;
  }

  async commit() {
    this.calls.push("commit");
  }

  async rollback() {
    this.calls.push("rollback");
    if (this.failRollback) {
      throw new Error("connection lost");
    }
  }

  async reset(connection: FakeConnection) {
    this.calls.push("reset");
    if (this.failReset) {
      throw new Error("connection lost");
    }
    connection.identity = null;
  }

  release(connection: FakeConnection, destroy: boolean) {
    this.calls.push("release");
    this.released.push({ id: connection.id, destroy });
  }

  // real in-process repositories over a connection nobody binds
  repositories(): Repositories {
    const db = new MemoryDatabase();
    return new MemorySessionDriver(db).repositories(new MemoryConnection(db));
  }

  async close() {
    this.calls.push("close");
  }
}

function setup() {
  const driver = new RecordingDriver();
  const logger = createTestLogger();
  const propagator = new SessionContextPropagator(driver, logger);
  return { driver, logger, propagator, identity: createIdentityContext(ALICE) };
}

describe("SessionContextPropagator", () => {
  it("binds, runs, commits, resets and releases in order", async () => {
    const { driver, propagator, identity } = setup();

    const result = await propagator.withContext(identity, async () => "done");

    expect(result).toBe("done");
    expect(driver.calls).toEqual(["acquire", `bind:${ALICE}`, "commit", "reset", "release"]);
    expect(driver.released).toEqual([{ id: 1, destroy: false }]);
  });

  it("rolls back and still resets when the callback throws", async () => {
    const { driver, propagator, identity } = setup();

    await expect(
      propagator.withContext(identity, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(driver.calls).toEqual(["acquire", `bind:${ALICE}`, "rollback", "reset", "release"]);
    expect(driver.released).toEqual([{ id: 1, destroy: false }]);
  });

  it("destroys the connection when rollback fails", async () => {
    const { driver, logger, propagator, identity } = setup();
    driver.failRollback = true;

    await expect(
      propagator.withContext(identity, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(driver.released).toEqual([{ id: 1, destroy: true }]);
    expect(logger.warn).toHaveBeenCalledWith(expect.anything(), "session rollback failed; discarding connection");
  });

  it("destroys the connection when reset fails", async () => {
    const { driver, propagator, identity } = setup();
    driver.failReset = true;

    await propagator.withContext(identity, async () => 1);

    expect(driver.released).toEqual([{ id: 1, destroy: true }]);
  });

  it("rejects a malformed identity before acquiring a connection", async () => {
    const { driver, propagator } = setup();
    const forged: IdentityContext = { identityId: "not-a-uuid", claims: {} };

    await expect(propagator.withContext(forged, async () => 1)).rejects.toBeInstanceOf(UnauthenticatedError);
    expect(driver.calls).toEqual([]);
  });

  it("does nothing when the signal is already aborted", async () => {
    const { driver, propagator, identity } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      propagator.withContext(identity, async () => 1, { signal: controller.signal }),
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(driver.calls).toEqual([]);
  });

  it("rolls back when the request is aborted while the callback runs", async () => {
    const { driver, propagator, identity } = setup();
    const controller = new AbortController();

    await expect(
      propagator.withContext(
        identity,
        async () => {
          controller.abort();
          return 1;
        },
        { signal: controller.signal },
      ),
    ).rejects.toMatchObject({ name: "AbortError" });

    expect(driver.calls).toEqual(["acquire", `bind:${ALICE}`, "rollback", "reset", "release"]);
  });

  it("refuses repository use once the session has ended", async () => {
    const { propagator, identity } = setup();
    const captured: { session?: BoundSession } = {};

    await propagator.withContext(identity, async (session) => {
      captured.session = session;
      expect(session.state).toBe("bound");
      await expect(session.repositories.memberships.countOwners("c")).resolves.toBe(0);
    });

    const leaked = captured.session;
    expect(leaked?.state).toBe("unbound");
    expect(() => leaked?.repositories.memberships.countOwners("c")).toThrow(InternalFailureError);
  });
});

class ObservedMemoryDriver extends MemorySessionDriver {
  readonly acquired: Array<{ connection: MemoryConnection; identityId: string | null }> = [];

  async acquire(): Promise<MemoryConnection> {
    const connection = await super.acquire();
    this.acquired.push({ connection, identityId: connection.identityId });
    return connection;
  }
}

describe("MemorySessionDriver pooling", () => {
  it("hands the same connection back without the previous identity", async () => {
    const logger = createTestLogger();
    const driver = new ObservedMemoryDriver(new MemoryDatabase());
    const provider = new SessionContextPropagator(driver, logger);
    const alice = createIdentityContext(ALICE);

    const cluster = await provider.withContext(alice, (session) =>
      createServices(session, logger).hierarchy.createCluster({ name: "Alpha" }),
    );
    await expect(
      provider.withContext(alice, async () => {
        throw new Error("handler failed");
      }),
    ).rejects.toThrow("handler failed");
    const seenByBob = await provider.withContext(createIdentityContext(BOB), async ({ repositories }) => ({
      cluster: await repositories.entities.findById("cluster", cluster.id, true),
      clusters: await repositories.entities.list("cluster", {
        page: 1,
        perPage: 25,
        sortBy: "created_at",
        sortOrder: "asc",
        includeDeleted: true,
      }),
      membership: await repositories.memberships.find(cluster.id, ALICE),
    }));

    expect(driver.acquired).toHaveLength(3);
    const [first, ...rest] = driver.acquired;
    for (const entry of rest) {
      expect(entry.connection).toBe(first?.connection);
    }
    expect(driver.acquired.map((entry) => entry.identityId)).toEqual([null, null, null]);
    expect(seenByBob).toEqual({ cluster: null, clusters: { items: [], total: 0 }, membership: null });
    expect(driver.activeConnections).toBe(0);
  });

  it("refuses to bind a connection that still carries an identity", async () => {
    const driver = new MemorySessionDriver(new MemoryDatabase());
    const connection = await driver.acquire();
    await driver.bind(connection, createIdentityContext(ALICE));

    await expect(driver.bind(connection, createIdentityContext(BOB))).rejects.toThrow(
      "connection still carries a bound identity",
    );

    await driver.reset(connection);
    driver.release(connection, false);
    expect(connection.identityId).toBeNull();
    expect(driver.activeConnections).toBe(0);
  });
});

describe("SessionStateMachine", () => {
  it("walks the full cycle", () => {
    const machine = new SessionStateMachine();
    const seen: SessionState[] = [machine.state];
    for (const next of ["binding", "bound", "unbinding", "unbound"] as const) {
      machine.transition(next);
      seen.push(machine.state);
    }
    expect(seen).toEqual(["unbound", "binding", "bound", "unbinding", "unbound"]);
  });

  it("rejects skipping a state", () => {
    const machine = new SessionStateMachine();
    expect(() => machine.transition("bound")).toThrow("Invalid session transition unbound -> bound");
  });
});
