/**
 * Request ID middleware.
 *
 * Every response carries X-Request-Id. A client-supplied id is echoed when
 * it is a plain token of at most 128 characters; otherwise the host mints
 * a UUID. The id is exposed to later middleware as `requestId` and ends up
 * in the request log.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(incoming: string | undefined): string {
  return incoming !== undefined && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : randomUUID();
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
