import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeSettings } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Update-Settings",
  type: "api",
  path: `${API_PREFIX}/settings`,
  method: "PUT",
  description: "Partially update detection and retention settings",
  flows: [API_FLOW],
  emits: [],
};

const settingsSchema = z.object({
  anomaly_threshold: z.number().optional(),
  frame_sampling_rate: z.number().optional(),
  auto_delete_old_videos: z.boolean().optional(),
  video_retention_days: z.number().optional(),
});

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to update settings", async () => {
    const { settings, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const body = parseBody(settingsSchema, req.body);

    const saved = await settings.update(user.id, {
      anomalyThreshold: body.anomaly_threshold,
      frameSamplingRate: body.frame_sampling_rate,
      autoDeleteOldVideos: body.auto_delete_old_videos,
      videoRetentionDays: body.video_retention_days,
    });
    return { status: 200, body: serializeSettings(saved) };
  });
