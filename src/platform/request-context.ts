import { UnauthenticatedError } from "../shared/errors.js";

export const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type IdentityClaims = Readonly<Record<string, unknown>>;

export interface IdentityContext {
  readonly identityId: string;
  readonly claims: IdentityClaims;
}

export interface RequestContext {
  requestId: string;
  identity: IdentityContext | null;
  signal: AbortSignal;
}

export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

export function createIdentityContext(identityId: string, claims: Record<string, unknown> = {}): IdentityContext {
  if (!isUuid(identityId)) {
    throw new UnauthenticatedError("Invalid identity");
  }
  return Object.freeze({
    identityId: identityId.toLowerCase(),
    claims: Object.freeze({ ...claims }),
  });
}
