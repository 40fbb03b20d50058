import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeSession } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Auth-Login",
  type: "api",
  path: `${API_PREFIX}/auth/login`,
  method: "POST",
  description: "Exchange email and password for an access token",
  flows: [API_FLOW],
  emits: [],
};

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Login failed", async () => {
    const { email, password } = parseBody(loginSchema, req.body);
    const { auth } = await getServices(logger);
    const session = await auth.login(email, password);
    logger.info("User logged in", { userId: session.user.id });
    return { status: 200, body: serializeSession(session) };
  });
