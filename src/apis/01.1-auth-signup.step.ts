import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeSession, serializeUser } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Auth-Signup",
  type: "api",
  path: `${API_PREFIX}/auth/signup`,
  method: "POST",
  description: "Register a new account with the identity provider",
  flows: [API_FLOW],
  emits: [],
};

const signupSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  full_name: z.string().trim().min(1).optional(),
});

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Signup failed", async () => {
    const body = parseBody(signupSchema, req.body);
    const { auth } = await getServices(logger);
    const { user, session } = await auth.signUp(body.email, body.password, body.full_name ?? null);

    if (!session) {
      return {
        status: 201,
        body: {
          message: "Signup successful. Please check your email to confirm your account.",
          user: serializeUser(user),
        },
      };
    }
    return { status: 201, body: serializeSession(session) };
  });
