import type { EventConfig, EventHandler } from "motia";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { getServices } from "../services";
import { getConfig } from "../shared/config";
import { errorMessage } from "../shared/errors";
import { PIPELINE_FLOW } from "../shared/http";
import type { FileDetectedData } from "../shared/interfaces";

export const config: EventConfig = {
  name: "Ingest-File",
  type: "event",
  description: "Register a video dropped into the ingest folder",
  flows: [PIPELINE_FLOW],
  subscribes: ["file.new.detected"],
  emits: [{ topic: "ingest.file.failed", label: "Ingest Failed", conditional: true }],
};

type IngestEmit = { topic: "ingest.file.failed"; data: { fileName: string; error: string; step: string } };

export const handler: EventHandler<FileDetectedData, IngestEmit> = async (
  input,
  { logger, emit }
) => {
  const { fileName, filePath } = input;
  const ownerId = getConfig().INGEST_OWNER_ID;
  if (!ownerId) {
    logger.warn("INGEST_OWNER_ID not set, ignoring dropped file", { fileName });
    return;
  }

  try {
    const { videos } = await getServices(logger);
    const { size } = await stat(filePath);
    const video = await videos.ingest(ownerId, fileName, size, () => createReadStream(filePath));

    if (!video) {
      logger.info("Skipping unsupported file", { fileName });
      return;
    }
    logger.info("Dropped file ingested", { fileName, videoId: video.id });
  } catch (error) {
    logger.error("Failed to ingest dropped file", { fileName, error: errorMessage(error) });
    await emit({
      topic: "ingest.file.failed",
      data: { fileName, error: errorMessage(error), step: "ingest-file" },
    });
  }
};
