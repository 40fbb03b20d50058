import type { ZodType, ZodTypeDef } from "zod";
import { AppError, BadRequestError, errorMessage } from "./errors";
import type { ServiceLogger } from "./logger";
import type { StateStore } from "./state";

export const API_PREFIX = "/api/v1";

export const API_FLOW = "surveillance.api";
export const PIPELINE_FLOW = "surveillance.pipeline";

export interface HttpResponse {
  status: number;
  headers?: Record<string, string>;
  body: unknown;
}

type ParamValue = string | string[] | undefined;

export interface RequestLike {
  headers: Record<string, ParamValue>;
  queryParams: Record<string, ParamValue>;
}

export interface RouteRequest<TBody = unknown> extends RequestLike {
  pathParams: Record<string, string>;
  body: TBody;
}

/**
 * The parts of the Motia flow context a step reads. Steps typed against it
 * still satisfy the Motia handler types, and tests can call them with fakes.
 */
export interface StepContext<TEmit = never> {
  logger: ServiceLogger;
  emit: (event: TEmit) => Promise<void>;
  state: StateStore;
  traceId: string;
}

export interface ErrorBody {
  error: string;
  status_code: number;
}

export function errorResponse(status: number, error: string): HttpResponse {
  const body: ErrorBody = { error, status_code: status };
  return { status, body };
}

/**
 * Runs a route body and maps failures to the `{error, status_code}` shape.
 * Expected failures carry their own status; anything else is logged and
 * reported as a 500 with the route's message.
 */
export async function respond(
  logger: ServiceLogger,
  failureMessage: string,
  run: () => Promise<HttpResponse>
): Promise<HttpResponse> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        logger.error(failureMessage, { error: error.message });
      }
      return errorResponse(error.status, error.message);
    }
    logger.error(failureMessage, {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return errorResponse(500, failureMessage);
  }
}

export function firstValue(value: ParamValue): string | undefined {
  if (Array.isArray(value)) return value[0];
  return value;
}

export function bearerToken(req: RequestLike): string | null {
  const header =
    firstValue(req.headers["authorization"]) ??
    firstValue(req.headers["Authorization"]);
  if (header && header.startsWith("Bearer ")) {
    const token = header.slice("Bearer ".length).trim();
    return token || null;
  }
  return null;
}

export function queryInt(
  req: RequestLike,
  name: string,
  fallback: number,
  { min = 1, max = 1000 }: { min?: number; max?: number } = {}
): number {
  const raw = firstValue(req.queryParams[name]);
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new BadRequestError(
      `${name} must be an integer between ${min} and ${max}`
    );
  }
  return value;
}

export function parseBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown
): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new BadRequestError(field ? `${field}: ${issue.message}` : issue.message);
  }
  return result.data;
}
