import { z } from "zod";

import { ChatServiceError } from "@/server/chat/types";
import { reportUnexpectedError } from "@/server/observability/sentry";

type ParseSuccess<T extends z.ZodTypeAny> = {
  success: true;
  data: z.infer<T>;
};

type ParseFailure = {
  success: false;
  response: Response;
};

const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export function returnError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): Response {
  const payload: ErrorResponse = {
    error: code,
    message,
    ...(details === undefined ? {} : { details }),
  };
  const parsed = errorResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Error payload failed validation: ${parsed.error.message}`);
  }
  return Response.json(parsed.data, { status });
}

/** Maps service errors to their status; anything else is reported and becomes a 500. */
export function errorToResponse(error: unknown, scope: string): Response {
  if (error instanceof ChatServiceError) {
    return returnError(error.status, error.code, error.message, error.details ?? undefined);
  }
  reportUnexpectedError(scope, error);
  return returnError(500, "internal_error", "Something went wrong.");
}

export async function parseJsonBody<T extends z.ZodTypeAny>(
  req: Request,
  schema: T,
): Promise<ParseSuccess<T> | ParseFailure> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    body = null;
  }
  const result = schema.safeParse(body);
  if (!result.success) {
    const formatted = result.error.flatten();
    return {
      success: false,
      response: returnError(400, "invalid_request", "Request body failed validation", formatted),
    };
  }
  return { success: true, data: result.data };
}

export function parseQuery<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
): ParseSuccess<T> | ParseFailure {
  const params = Object.fromEntries(new URL(url).searchParams.entries());
  const result = schema.safeParse(params);
  if (!result.success) {
    return {
      success: false,
      response: returnError(400, "invalid_query", "Query parameters failed validation", result.error.flatten()),
    };
  }
  return { success: true, data: result.data };
}

export function validatedJson<T extends z.ZodTypeAny>(
  schema: T,
  payload: z.infer<T>,
  init?: ResponseInit,
): Response {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new Error(`Response payload failed validation: ${result.error.message}`);
  }
  return Response.json(result.data, init);
}
