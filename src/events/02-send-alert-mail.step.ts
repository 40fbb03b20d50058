import type { EventConfig, EventHandler } from "motia";
import { getServices } from "../services";
import { getConfig } from "../shared/config";
import { errorMessage } from "../shared/errors";
import { PIPELINE_FLOW } from "../shared/http";
import type { ProcessingCompletedData } from "../shared/interfaces";
import { sendAlertMail } from "../helper/alert-mail";

export const config: EventConfig = {
  name: "Send-Alert-Mail",
  type: "event",
  description: "Email the owner when an analysis produced alert-level detections",
  flows: [PIPELINE_FLOW],
  subscribes: ["video.processing.completed"],
  emits: [],
};

export const handler: EventHandler<ProcessingCompletedData, never> = async (
  input,
  { logger, state, traceId }
) => {
  const { videoId, userId, alerts } = input;
  if (alerts === 0) return;

  const { BREVO_API_KEY, BREVO_SENDER_EMAIL } = getConfig();
  if (!BREVO_API_KEY || !BREVO_SENDER_EMAIL) {
    logger.warn("Brevo not configured, skipping alert email", { videoId });
    return;
  }

  try {
    const services = await getServices(logger);
    const video = await services.videos.getOwned(userId, videoId);
    const recipient = await services.auth.profile(userId);
    if (!recipient?.email) {
      logger.warn("No email on file for video owner, skipping alert email", { videoId, userId });
      return;
    }

    const events = await services.videos.events(userId, videoId);
    await sendAlertMail({
      apiKey: BREVO_API_KEY,
      senderEmail: BREVO_SENDER_EMAIL,
      recipient: { email: recipient.email, name: recipient.fullName },
      videoName: video.originalName,
      videoId,
      alerts: events.filter((event) => event.isAlert),
    });

    logger.info("Alert email sent", { videoId, to: recipient.email, alerts });
    await state.set(traceId, "alertNotification", {
      sent: true,
      to: recipient.email,
      sentAt: new Date().toISOString(),
    });
  } catch (error) {
    logger.error("Error sending alert email", { videoId, error: errorMessage(error) });
    await state.set(traceId, "alertNotification", {
      sent: false,
      error: errorMessage(error),
      failedAt: new Date().toISOString(),
    });
  }
};
