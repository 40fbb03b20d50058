import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeEvent } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Event-Feedback",
  type: "api",
  path: `${API_PREFIX}/events/:id/feedback`,
  method: "POST",
  description: "Mark a detection as a false positive or rate it",
  flows: [API_FLOW],
  emits: [],
};

const feedbackSchema = z.object({
  is_false_positive: z.boolean(),
  feedback_score: z.number().min(-1).max(1),
  comments: z.string().max(2000).nullish(),
});

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to save feedback", async () => {
    const services = await getServices(logger);
    const user = await services.auth.authenticate(bearerToken(req));
    const body = parseBody(feedbackSchema, req.body);

    const event = await services.events.submitFeedback(user.id, req.pathParams.id, {
      isFalsePositive: body.is_false_positive,
      feedbackScore: body.feedback_score,
      comments: body.comments ?? null,
    });
    return { status: 200, body: { message: "Feedback recorded", event: serializeEvent(event) } };
  });
