import { describe, expect, it } from "vitest";

import type { Repositories } from "../src/db/repositories.js";

import { RowPolicyViolationError } from "../src/db/errors.js";
import { createIdentityContext } from "../src/platform/request-context.js";
import { ALICE, CAROL, createMemoryStack } from "./support.js";

async function setupForeignTree() {
  const stack = createMemoryStack();
  const { as } = stack;
  const cluster = await as(ALICE, (services) => services.hierarchy.createCluster({ name: "Private" }));
  const domain = await as(ALICE, (services) => services.hierarchy.createDomain(cluster.id, { name: "Ledger" }));
  const resource = await as(ALICE, (services) =>
    services.hierarchy.createResource(domain.id, { name: "db", resource_type: "postgres" }),
  );

  function raw<T>(identityId: string, fn: (repositories: Repositories) => Promise<T>): Promise<T> {
    return stack.provider.withContext(createIdentityContext(identityId), (session) => fn(session.repositories));
  }

  return { ...stack, raw, clusterId: cluster.id, domainId: domain.id, resourceId: resource.id };
}

const listAll = {
  page: 1,
  perPage: 100,
  sortBy: "created_at",
  sortOrder: "asc",
  includeDeleted: true,
} as const;

describe("row filtering below the guard", () => {
  it("returns nothing of another identity's tree", async () => {
    const { raw, clusterId, domainId, resourceId } = await setupForeignTree();

    const seen = await raw(CAROL, async ({ entities, memberships }) => ({
      cluster: await entities.findById("cluster", clusterId, true),
      domain: await entities.findById("domain", domainId, true),
      resource: await entities.findById("resource", resourceId, true),
      clusters: await entities.list("cluster", listAll),
      resources: await entities.list("resource", listAll),
      membership: await memberships.find(clusterId, ALICE),
      owners: await memberships.countOwners(clusterId),
      children: await entities.countLiveChildren("cluster", clusterId),
    }));

    expect(seen).toEqual({
      cluster: null,
      domain: null,
      resource: null,
      clusters: { items: [], total: 0 },
      resources: { items: [], total: 0 },
      membership: null,
      owners: 0,
      children: 0,
    });
  });

  it("turns writes to invisible rows into no-ops", async () => {
    const { raw, clusterId, domainId, resourceId } = await setupForeignTree();

    const outcome = await raw(CAROL, async ({ entities, memberships, links }) => ({
      updated: await entities.update("domain", domainId, { name: "Stolen" }),
      marked: await entities.markDeleted("resource", resourceId),
      removed: await entities.remove("cluster", clusterId),
      demoted: await memberships.update(clusterId, ALICE, { role: "member" }),
      evicted: await memberships.remove(clusterId, ALICE),
    }));
    const intact = await raw(ALICE, (repositories) => repositories.entities.findById("domain", domainId, false));

    expect(outcome).toEqual({ updated: null, marked: false, removed: false, demoted: null, evicted: false });
    expect(intact?.name).toBe("Ledger");
  });

  it("rejects inserts that fall outside the caller's closure", async () => {
    const { raw, clusterId } = await setupForeignTree();

    await expect(
      raw(CAROL, ({ memberships }) =>
        memberships.insert({ cluster_id: clusterId, identity_id: CAROL, role: "owner", comment: null }),
      ),
    ).rejects.toBeInstanceOf(RowPolicyViolationError);
    await expect(
      raw(CAROL, ({ entities }) =>
        entities.insert("domain", {
          id: "44444444-4444-4444-8444-444444444444",
          created_by: ALICE,
          attrs: { name: "Forged" },
        }),
      ),
    ).rejects.toThrow("new row violates row-level security policy for domains");
  });

  it("hides a child once it has no visible parent left", async () => {
    const { as, raw, clusterId, domainId } = await setupForeignTree();

    await as(ALICE, (services) => services.hierarchy.unlinkChild("cluster", clusterId, "domain", domainId));
    const orphan = await raw(ALICE, ({ entities }) => entities.findById("domain", domainId, true));

    expect(orphan).toBeNull();
  });
});
