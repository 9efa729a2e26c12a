import { SignJWT } from "jose";
import { vi } from "vitest";

import type { Services } from "../src/platform/services.js";
import type { LoggerLike } from "../src/shared/logger.js";

import { buildApp } from "../src/app.js";
import { MemoryDatabase } from "../src/db/memory/memory-database.js";
import { MemorySessionDriver } from "../src/db/memory/memory-session-driver.js";
import { SessionContextPropagator } from "../src/db/session-context.js";
import { createIdentityContext } from "../src/platform/request-context.js";
import { createServices } from "../src/platform/services.js";

export const ALICE = "11111111-1111-4111-8111-111111111111";
export const BOB = "22222222-2222-4222-8222-222222222222";
export const CAROL = "33333333-3333-4333-8333-333333333333";
export const MISSING_ID = "99999999-9999-4999-8999-999999999999";

export const TEST_SECRET = "test-secret-test-secret";
export const TEST_ISSUER = "strata-identity";
export const TEST_AUDIENCE = "strata-api";

export function createTestLogger(): LoggerLike {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Deterministic clock: every call advances one second from 2024-01-01. */
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

export function createMemoryStack() {
  const db = new MemoryDatabase(steppingClock());
  const driver = new MemorySessionDriver(db);
  const logger = createTestLogger();
  const provider = new SessionContextPropagator(driver, logger);

  /** Runs `fn` in one committed session bound to `identityId`. */
  async function as<T>(identityId: string, fn: (services: Services) => Promise<T>): Promise<T> {
    return provider.withContext(createIdentityContext(identityId), (session) => fn(createServices(session, logger)));
  }

  return { db, driver, logger, provider, as };
}

export function useTestEnv(overrides: Record<string, string> = {}) {
  const values: Record<string, string> = {
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    STORAGE_DRIVER: "memory",
    JWT_SECRET: TEST_SECRET,
    JWT_ISSUER: TEST_ISSUER,
    JWT_AUDIENCE: TEST_AUDIENCE,
    ...overrides,
  };
  for (const [key, value] of Object.entries(values)) {
    vi.stubEnv(key, value);
  }
}

export async function signToken(
  subject: string,
  options: { secret?: string; issuer?: string; audience?: string } = {},
): Promise<string> {
  return new SignJWT({ name: "Test User" })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(subject)
    .setIssuer(options.issuer ?? TEST_ISSUER)
    .setAudience(options.audience ?? TEST_AUDIENCE)
    .setIssuedAt()
    .setExpirationTime("1h")
    .sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

/** App on the in-process store; call `useTestEnv` first so the config loads. */
export async function buildTestApp() {
  const stack = createMemoryStack();
  const app = await buildApp({ database: stack.provider });
  const tokens = new Map<string, string>();

  async function authHeaders(identityId: string): Promise<Record<string, string>> {
    let token = tokens.get(identityId);
    if (!token) {
      token = await signToken(identityId);
      tokens.set(identityId, token);
    }
    return { authorization: `Bearer ${token}` };
  }

  return { ...stack, app, authHeaders };
}
