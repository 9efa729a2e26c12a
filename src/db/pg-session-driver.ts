import type { IdentityContext } from "../platform/request-context.js";
import type { LoggerLike } from "../shared/logger.js";
import type { Queryable } from "./pg-repositories.js";
import type { Repositories } from "./repositories.js";
import type { SessionDriver } from "./session-context.js";

import { APP_ROLE, IDENTITY_SETTING } from "../access/row-policy.js";
import { PgEntityRepository, PgLinkRepository, PgMembershipRepository } from "./pg-repositories.js";

export interface PgClientLike extends Queryable {
  release(destroy?: boolean): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export class PgSessionDriver implements SessionDriver<PgClientLike> {
  constructor(
    private readonly pool: PgPoolLike,
    logger: LoggerLike,
  ) {
    pool.on("error", (error) => {
      logger.error({ err: error }, "unexpected idle client error");
    });
  }

  async acquire(): Promise<PgClientLike> {
    return this.pool.connect();
  }

  async bind(client: PgClientLike, identity: IdentityContext) {
    await client.query("begin isolation level read committed");
    await client.query(`set local role ${APP_ROLE}`);
    await client.query("select set_config($1, $2, true)", [IDENTITY_SETTING, identity.identityId]);
  }

  async commit(client: PgClientLike) {
    await client.query("commit");
  }

  async rollback(client: PgClientLike) {
    await client.query("rollback");
  }

  async reset(client: PgClientLike) {
    await client.query("select set_config($1, '', false)", [IDENTITY_SETTING]);
  }

  release(client: PgClientLike, destroy: boolean) {
    client.release(destroy);
  }

  repositories(client: PgClientLike): Repositories {
    return {
      entities: new PgEntityRepository(client),
      memberships: new PgMembershipRepository(client),
      links: new PgLinkRepository(client),
    };
  }

  async close() {
    await this.pool.end();
  }
}
