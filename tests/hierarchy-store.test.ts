import { describe, expect, it } from "vitest";

import type { BoundSession } from "../src/db/session-context.js";

import { HierarchyStore } from "../src/hierarchy/hierarchy-store.js";
import { createIdentityContext } from "../src/platform/request-context.js";
import { ConflictError, NotFoundError, ValidationFailedError } from "../src/shared/errors.js";
import { ALICE, BOB, createMemoryStack } from "./support.js";

const listDefaults = {
  page: 1,
  perPage: 25,
  sortBy: "name",
  sortOrder: "asc",
  includeDeleted: false,
} as const;

function setup() {
  const stack = createMemoryStack();
  async function withStore<T>(identityId: string, fn: (store: HierarchyStore, session: BoundSession) => Promise<T>) {
    return stack.provider.withContext(createIdentityContext(identityId), (session) =>
      fn(new HierarchyStore(session.repositories.entities, session.identity), session),
    );
  }
  return { ...stack, withStore };
}

describe("HierarchyStore validation", () => {
  it("rejects a blank name", async () => {
    const { withStore } = setup();

    const error = await withStore(ALICE, (store) => store.create("domain", { name: "   " })).catch((caught) => caught);

    expect(error).toBeInstanceOf(ValidationFailedError);
    expect(error).toMatchObject({ fieldErrors: { name: ["can't be blank"] } });
  });

  it("reports every attribute over its limit", async () => {
    const { withStore } = setup();

    const error = await withStore(ALICE, (store) =>
      store.create("resource", { name: "n".repeat(256), resource_type: "t".repeat(101) }),
    ).catch((caught) => caught);

    expect(error).toMatchObject({
      fieldErrors: {
        name: ["is too long (maximum is 255 characters)"],
        resource_type: ["is too long (maximum is 100 characters)"],
      },
    });
  });

  it("counts characters rather than UTF-16 units", async () => {
    const { as } = setup();
    const smile = "\u{1F600}";

    const accepted = await as(ALICE, (services) => services.hierarchy.createCluster({ name: smile.repeat(255) }));
    const error = await as(ALICE, (services) => services.hierarchy.createCluster({ name: smile.repeat(256) })).catch(
      (caught) => caught,
    );

    expect([...accepted.name]).toHaveLength(255);
    expect(error).toMatchObject({ fieldErrors: { name: ["is too long (maximum is 255 characters)"] } });
  });

  it("limits descriptions to 10000 characters", async () => {
    const { withStore } = setup();

    const error = await withStore(ALICE, (store) =>
      store.create("domain", { name: "D1", description: "d".repeat(10001) }),
    ).catch((caught) => caught);

    expect(error).toMatchObject({ fieldErrors: { description: ["is too long (maximum is 10000 characters)"] } });
  });
});

describe("HierarchyStore with clusters", () => {
  it("trims names and stamps timestamps from the store clock", async () => {
    const { as } = setup();

    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "  Alpha  " }));

    expect(cluster).toMatchObject({
      name: "Alpha",
      description: null,
      created_by: ALICE,
      created_at: "2024-01-01T00:00:00.000Z",
      updated_at: "2024-01-01T00:00:00.000Z",
      deleted_at: null,
    });
  });

  it("touches updated_at on update", async () => {
    const { as } = setup();
    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));

    const updated = await as(ALICE, (services) =>
      services.hierarchy.updateEntity("cluster", cluster.id, { description: "Primary" }),
    );

    expect(updated.description).toBe("Primary");
    expect(updated.created_at).toBe("2024-01-01T00:00:00.000Z");
    expect(updated.updated_at).toBe("2024-01-01T00:00:02.000Z");
  });

  it("rejects a second live cluster with the same name from the same creator", async () => {
    const { as } = setup();
    await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));

    const error = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "ALPHA" })).catch(
      (caught) => caught,
    );
    const other = await as(BOB, (services) => services.hierarchy.createCluster({ name: "Alpha" }));

    expect(error).toBeInstanceOf(ValidationFailedError);
    expect(error).toMatchObject({ fieldErrors: { name: ["has already been taken"] } });
    expect(other.name).toBe("Alpha");
  });

  it("reports a rename onto a name the creator uses elsewhere even when that cluster is hidden", async () => {
    const { as } = setup();
    const shared = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Shared" }));
    await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Private" }));
    await as(ALICE, (services) => services.memberships.addMember(services.identity, shared.id, BOB, "admin"));

    const error = await as(BOB, (services) =>
      services.hierarchy.updateEntity("cluster", shared.id, { name: "private" }),
    ).catch((caught) => caught);

    expect(error).toBeInstanceOf(ValidationFailedError);
    expect(error).toMatchObject({ fieldErrors: { name: ["has already been taken"] } });
  });

  it("sorts, searches and pages lists", async () => {
    const { as, withStore } = setup();
    for (const name of ["gamma", "alpha", "beta"]) {
      await as(ALICE, (services) => services.hierarchy.createCluster({ name }));
    }

    const firstPage = await withStore(ALICE, (store) => store.list("cluster", { ...listDefaults, perPage: 2 }));
    const searched = await withStore(ALICE, (store) => store.list("cluster", { ...listDefaults, search: "ET" }));
    const descending = await withStore(ALICE, (store) =>
      store.list("cluster", { ...listDefaults, sortOrder: "desc" }),
    );

    expect(firstPage.total).toBe(3);
    expect(firstPage.items.map((cluster) => cluster.name)).toEqual(["alpha", "beta"]);
    expect(searched.items.map((cluster) => cluster.name)).toEqual(["beta"]);
    expect(descending.items.map((cluster) => cluster.name)).toEqual(["gamma", "beta", "alpha"]);
  });
});

describe("HierarchyStore deletion", () => {
  it("hides soft-deleted rows unless asked for them", async () => {
    const { as, withStore } = setup();
    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));

    await withStore(ALICE, (store) => store.softDelete("cluster", cluster.id));

    await expect(withStore(ALICE, (store) => store.get("cluster", cluster.id))).rejects.toBeInstanceOf(NotFoundError);
    const kept = await withStore(ALICE, (store) => store.get("cluster", cluster.id, { includeDeleted: true }));
    expect(kept.deleted_at).toBe("2024-01-01T00:00:02.000Z");

    const live = await withStore(ALICE, (store) => store.list("cluster", listDefaults));
    const all = await withStore(ALICE, (store) => store.list("cluster", { ...listDefaults, includeDeleted: true }));
    expect(live.total).toBe(0);
    expect(all.total).toBe(1);
  });

  it("refuses to delete a cluster with live domains until they are gone", async () => {
    const { as } = setup();
    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));
    const domain = await as(ALICE, (services) => services.hierarchy.createDomain(cluster.id, { name: "D1" }));

    const blocked = as(ALICE, (services) => services.hierarchy.deleteEntity("cluster", cluster.id));
    await expect(blocked).rejects.toBeInstanceOf(ConflictError);
    await expect(blocked).rejects.toThrow("Cluster still has 1 linked domains");

    await as(ALICE, (services) => services.hierarchy.deleteEntity("domain", domain.id));
    await as(ALICE, (services) => services.hierarchy.deleteEntity("cluster", cluster.id));

    await expect(as(ALICE, (services) => services.hierarchy.getEntity("cluster", cluster.id))).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it("refuses to hard-delete a domain with live resources", async () => {
    const { as } = setup();
    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));
    const domain = await as(ALICE, (services) => services.hierarchy.createDomain(cluster.id, { name: "D1" }));
    await as(ALICE, (services) => services.hierarchy.createResource(domain.id, { name: "R1" }));

    await expect(
      as(ALICE, (services) => services.hierarchy.deleteEntity("domain", domain.id, { hard: true })),
    ).rejects.toThrow("Domain still has 1 linked resources");
  });

  it("hard delete cascades junction rows and memberships", async () => {
    const { as, db } = setup();
    const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Alpha" }));
    const domain = await as(ALICE, (services) => services.hierarchy.createDomain(cluster.id, { name: "D1" }));
    await as(ALICE, (services) => services.hierarchy.deleteEntity("domain", domain.id));

    await as(ALICE, (services) => services.hierarchy.deleteEntity("cluster", cluster.id, { hard: true }));

    expect(db.entities.cluster.has(cluster.id)).toBe(false);
    expect(db.entities.domain.has(domain.id)).toBe(true);
    expect(db.links.cluster_domain.size).toBe(0);
    expect(db.memberships.size).toBe(0);
  });
});
