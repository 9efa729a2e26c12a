import type { IdentityContext } from "../platform/request-context.js";
import type { LoggerLike } from "../shared/logger.js";
import type { Repositories } from "./repositories.js";

import { isUuid } from "../platform/request-context.js";
import { InternalFailureError, UnauthenticatedError } from "../shared/errors.js";

export type SessionState = "unbound" | "binding" | "bound" | "unbinding";

const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = Object.freeze({
  unbound: ["binding"],
  binding: ["bound", "unbinding"],
  bound: ["unbinding"],
  unbinding: ["unbound"],
});

/**
 * Connection-level operations a storage backend provides to the propagator.
 * `bind` starts the transaction and sets the identity; `reset` must leave the
 * connection without any identity so it can go back to the pool.
 */
export interface SessionDriver<TConnection> {
  acquire(): Promise<TConnection>;
  bind(connection: TConnection, identity: IdentityContext): Promise<void>;
  commit(connection: TConnection): Promise<void>;
  rollback(connection: TConnection): Promise<void>;
  reset(connection: TConnection): Promise<void>;
  release(connection: TConnection, destroy: boolean): void;
  repositories(connection: TConnection): Repositories;
  close(): Promise<void>;
}

export interface BoundSession {
  readonly identity: IdentityContext;
  readonly repositories: Repositories;
  readonly state: SessionState;
}

export type WithContextOptions = {
  signal?: AbortSignal;
};

export interface SessionProvider {
  withContext<T>(
    identity: IdentityContext,
    fn: (session: BoundSession) => Promise<T>,
    options?: WithContextOptions,
  ): Promise<T>;
  close(): Promise<void>;
}

export class SessionStateMachine {
  private current: SessionState = "unbound";

  get state(): SessionState {
    return this.current;
  }

  transition(next: SessionState) {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InternalFailureError(`Invalid session transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}

function guardRepository<T extends object>(target: T, machine: SessionStateMachine): T {
  return new Proxy(target, {
    get(obj, property, receiver) {
      const value: unknown = Reflect.get(obj, property, receiver);
      if (typeof value !== "function") {
        return value;
      }
      return (...args: unknown[]) => {
        if (machine.state !== "bound") {
          throw new InternalFailureError(`Repository used outside a bound session (state: ${machine.state})`);
        }
        return Reflect.apply(value, obj, args);
      };
    },
  });
}

class Session implements BoundSession {
  readonly repositories: Repositories;

  constructor(
    readonly identity: IdentityContext,
    repositories: Repositories,
    private readonly machine: SessionStateMachine,
  ) {
    this.repositories = {
      entities: guardRepository(repositories.entities, machine),
      memberships: guardRepository(repositories.memberships, machine),
      links: guardRepository(repositories.links, machine),
    };
  }

  get state(): SessionState {
    return this.machine.state;
  }
}

export class SessionContextPropagator<TConnection> implements SessionProvider {
  constructor(
    private readonly driver: SessionDriver<TConnection>,
    private readonly logger: LoggerLike,
  ) {}

  async withContext<T>(
    identity: IdentityContext,
    fn: (session: BoundSession) => Promise<T>,
    options: WithContextOptions = {},
  ): Promise<T> {
    if (!isUuid(identity.identityId)) {
      throw new UnauthenticatedError("Invalid identity");
    }
    options.signal?.throwIfAborted();

    const connection = await this.driver.acquire();
    const machine = new SessionStateMachine();
    const session = new Session(identity, this.driver.repositories(connection), machine);
    let destroy = false;

    try {
      machine.transition("binding");
      await this.driver.bind(connection, identity);
      machine.transition("bound");
      this.logger.debug({ identityId: identity.identityId }, "session bound");

      const result = await fn(session);
      options.signal?.throwIfAborted();

      machine.transition("unbinding");
      await this.driver.commit(connection);
      return result;
    } catch (error) {
      if (machine.state !== "unbinding") {
        machine.transition("unbinding");
      }
      if (!(await this.rollback(connection))) {
        destroy = true;
      }
      throw error;
    } finally {
      if (!(await this.reset(connection))) {
        destroy = true;
      }
      this.driver.release(connection, destroy);
      machine.transition("unbound");
      this.logger.debug({ identityId: identity.identityId, destroyed: destroy }, "session unbound");
    }
  }

  async close() {
    await this.driver.close();
  }

  private async rollback(connection: TConnection): Promise<boolean> {
    try {
      await this.driver.rollback(connection);
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "session rollback failed; discarding connection");
      return false;
    }
  }

  private async reset(connection: TConnection): Promise<boolean> {
    try {
      await this.driver.reset(connection);
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "session reset failed; discarding connection");
      return false;
    }
  }
}
