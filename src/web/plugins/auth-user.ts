import type { FastifyRequest } from "fastify";

import { jwtVerify, type JWTPayload } from "jose";

import type { EnvConfig } from "../../config/index.js";
import type { IdentityContext } from "../../platform/request-context.js";

import { createIdentityContext } from "../../platform/request-context.js";
import { UnauthenticatedError } from "../../shared/errors.js";

export async function verifyUserJwt(token: string, config: EnvConfig): Promise<JWTPayload> {
  const secret = new TextEncoder().encode(config.JWT_SECRET);
  const { payload } = await jwtVerify(token, secret, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
    algorithms: ["HS256"],
  });

  return payload;
}

export async function requireUserAuth(request: FastifyRequest, config: EnvConfig): Promise<IdentityContext> {
  if (request.requestContext.identity) {
    return request.requestContext.identity;
  }

  const header = request.headers.authorization;
  if (!header?.startsWith("Bearer ")) {
    throw new UnauthenticatedError();
  }

  const token = header.slice("Bearer ".length);
  let claims: JWTPayload;
  try {
    claims = await verifyUserJwt(token, config);
  } catch (error) {
    request.log.debug({ err: error }, "bearer token rejected");
    throw new UnauthenticatedError();
  }

  if (typeof claims.sub !== "string") {
    throw new UnauthenticatedError();
  }

  const identity = createIdentityContext(claims.sub, claims);
  request.requestContext.identity = identity;
  return identity;
}
