import type { ApiRouteConfig, ApiRouteHandler } from "motia";
import { z } from "zod";
import { getServices } from "../services";
import { API_FLOW, API_PREFIX, bearerToken, parseBody, respond, type HttpResponse } from "../shared/http";
import { serializeVideo } from "../shared/serializers";

export const config: ApiRouteConfig = {
  name: "Upload-Video",
  type: "api",
  path: `${API_PREFIX}/videos/upload`,
  method: "POST",
  description: "Store a video and register it with status uploaded",
  flows: [API_FLOW],
  emits: [],
};

const uploadSchema = z.object({
  filename: z.string().trim().min(1),
  content_type: z.string().min(1),
  data: z.string(),
});

export const handler: ApiRouteHandler<unknown, HttpResponse, never> = async (req, { logger }) =>
  respond(logger, "Failed to upload video", async () => {
    const { videos, auth } = await getServices(logger);
    const user = await auth.authenticate(bearerToken(req));
    const body = parseBody(uploadSchema, req.body);

    const video = await videos.upload(user.id, {
      filename: body.filename,
      contentType: body.content_type,
      data: Buffer.from(body.data, "base64"),
    });
    return { status: 201, body: serializeVideo(video) };
  });
