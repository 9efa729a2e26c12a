import type { IdentityContext } from "../../platform/request-context.js";
import type { Repositories } from "../repositories.js";
import type { SessionDriver } from "../session-context.js";

import { MemoryConnection, MemoryDatabase } from "./memory-database.js";
import { MemoryEntityRepository, MemoryLinkRepository, MemoryMembershipRepository } from "./memory-repositories.js";

export class MemorySessionDriver implements SessionDriver<MemoryConnection> {
  private readonly idle: MemoryConnection[] = [];
  private borrowed = 0;

  constructor(readonly db: MemoryDatabase = new MemoryDatabase()) {}

  get activeConnections(): number {
    return this.borrowed;
  }

  async acquire(): Promise<MemoryConnection> {
    this.borrowed += 1;
    return this.idle.pop() ?? new MemoryConnection(this.db);
  }

  async bind(connection: MemoryConnection, identity: IdentityContext) {
    if (connection.identityId !== null) {
      throw new Error("connection still carries a bound identity");
    }
    connection.begin(identity.identityId);
  }

  async commit(connection: MemoryConnection) {
    connection.commit();
  }

  async rollback(connection: MemoryConnection) {
    connection.rollback();
  }

  async reset(connection: MemoryConnection) {
    connection.reset();
  }

  release(connection: MemoryConnection, destroy: boolean) {
    this.borrowed -= 1;
    if (!destroy) {
      this.idle.push(connection);
    }
  }

  repositories(connection: MemoryConnection): Repositories {
    return {
      entities: new MemoryEntityRepository(connection),
      memberships: new MemoryMembershipRepository(connection),
      links: new MemoryLinkRepository(connection),
    };
  }

  async close() {
    this.idle.length = 0;
  }
}
