import type { Context, Next } from "hono";

import type { CredentialResolver } from "@/ports/auth";
import { ChatServiceError } from "@/server/chat/types";
import { errorToResponse, returnError } from "@/server/validation/http";

export type ChatHttpEnv = {
  Variables: {
    userId: string;
  };
};

export function readBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  const token = match?.[1]?.trim();
  return token ? token : null;
}

/** Resolves the bearer token and stores the caller's id on the context. */
export function requireBearerAuth(resolver: CredentialResolver) {
  return async (c: Context<ChatHttpEnv>, next: Next): Promise<Response | undefined> => {
    const token = readBearerToken(c.req.header("authorization"));
    if (!token) {
      return returnError(401, "auth_required", "Missing bearer token.");
    }
    try {
      const credential = await resolver.resolve(token);
      c.set("userId", credential.userId);
    } catch (error) {
      if (error instanceof ChatServiceError && error.status === 401) {
        return returnError(401, error.code, error.message);
      }
      return errorToResponse(error, "chat.http.auth_failed");
    }
    await next();
    return undefined;
  };
}
