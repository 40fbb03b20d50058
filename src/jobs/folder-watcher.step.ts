import type { CronConfig, CronHandler } from "motia";
import { watch } from "chokidar";
import path from "node:path";
import { getConfig } from "../shared/config";
import { errorMessage } from "../shared/errors";
import { PIPELINE_FLOW } from "../shared/http";
import type { FileDetectedData } from "../shared/interfaces";

let watcherInitialized = false;

export const config: CronConfig = {
  name: "WatchIngestFolder",
  type: "cron",
  cron: "* * * * *", // the watcher itself runs persistently once started
  description: "Watches the ingest folder for new video files",
  flows: [PIPELINE_FLOW],
  emits: ["file.new.detected"],
};

const IGNORED = /(^|[\\/])(~[^\\/]*|\.DS_Store|Thumbs\.db)$|\.tmp$/;
const STATE_GROUP = "fileWatcher";
const KNOWN_FILES_KEY = "knownFiles";

type WatcherEmit = { topic: "file.new.detected"; data: FileDetectedData };

export const handler: CronHandler<WatcherEmit> = async ({ logger, state, emit }) => {
  const { INGEST_FOLDER } = getConfig();
  if (!INGEST_FOLDER || watcherInitialized) {
    return;
  }

  const folderPath = path.resolve(INGEST_FOLDER);
  watcherInitialized = true;
  logger.info("Initializing file watcher...", { folderPath });

  if (!(await state.get<string[]>(STATE_GROUP, KNOWN_FILES_KEY))) {
    await state.set<string[]>(STATE_GROUP, KNOWN_FILES_KEY, []);
  }

  const watcher = watch(folderPath, {
    ignoreInitial: true,
    depth: 0,
    persistent: true,
    awaitWriteFinish: {
      stabilityThreshold: 500,
      pollInterval: 100,
    },
    ignored: (candidate: string) => IGNORED.test(candidate),
  });

  const onAdd = async (filePath: string) => {
    const fileName = path.basename(filePath);
    const known = (await state.get<string[]>(STATE_GROUP, KNOWN_FILES_KEY)) ?? [];
    if (known.includes(fileName)) return;

    logger.info("New file detected", { fileName, filePath });
    await state.set(STATE_GROUP, KNOWN_FILES_KEY, [...known, fileName]);
    await emit({ topic: "file.new.detected", data: { fileName, filePath } });
  };

  watcher.on("add", (filePath: string) => {
    onAdd(filePath).catch((error: unknown) => {
      logger.error("Failed to announce new file", { filePath, error: errorMessage(error) });
    });
  });

  watcher.on("error", (error: unknown) => {
    logger.error("File watcher error", { error: errorMessage(error) });
  });
};
