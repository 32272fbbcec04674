import type { IncomingHttpHeaders } from "http";
import { ErrorCode, ValidationError, type UserId } from "@platform/deployment/domain";

export type RequestContext = {
  userId?: UserId;
  requestId?: string;
  source: "header" | "system";
};

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Identity has already been authenticated upstream and forwarded as headers. */
export function resolveRequestContext(headers: IncomingHttpHeaders): RequestContext {
  return {
    userId: header(headers, "x-user-id"),
    requestId: header(headers, "x-request-id"),
    source: "header",
  };
}

export function createSystemContext(userId: UserId): RequestContext {
  return { userId, source: "system" };
}

export function requireRequester(ctx: RequestContext): UserId {
  if (!ctx.userId) {
    throw new ValidationError(ErrorCode.RequesterRequired, "Command requires an authenticated requester");
  }
  return ctx.userId;
}
