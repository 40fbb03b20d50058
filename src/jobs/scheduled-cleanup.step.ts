import type { CronConfig, CronHandler } from "motia";
import { getServices } from "../services";
import { getConfig } from "../shared/config";
import { errorMessage } from "../shared/errors";
import { API_FLOW } from "../shared/http";
import { serializeScheduledReport } from "../shared/serializers";

export const config: CronConfig = {
  name: "ScheduledCleanup",
  type: "cron",
  cron: "0 3 * * *", // daily at 03:00
  description: "Apply the retention policy for every user with auto-delete enabled",
  flows: [API_FLOW],
  emits: [],
};

export const handler: CronHandler<never> = async ({ logger, state }) => {
  if (!getConfig().SCHEDULED_CLEANUP_ENABLED) {
    logger.debug("Scheduled cleanup disabled");
    return;
  }

  try {
    const { cleanup } = await getServices(logger);
    const report = await cleanup.runScheduled();

    logger.info("Scheduled cleanup finished", serializeScheduledReport(report));
    await state.set("cleanup", "lastRun", {
      ...serializeScheduledReport(report),
      finishedAt: new Date().toISOString(),
    });
  } catch (error) {
    logger.error("Scheduled cleanup failed", { error: errorMessage(error) });
  }
};
