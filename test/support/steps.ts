import { vi } from "vitest";
import type { RouteRequest } from "../../src/shared/http";
import { MemoryState, createLogger } from "./fakes";

export function createStepContext(state: MemoryState = new MemoryState()) {
  return {
    logger: createLogger(),
    emit: vi.fn(async (_event: unknown): Promise<void> => undefined),
    state,
    traceId: "trace-1",
  };
}

export function routeRequest(overrides: Partial<RouteRequest> = {}): RouteRequest {
  return { headers: {}, queryParams: {}, pathParams: {}, body: undefined, ...overrides };
}
