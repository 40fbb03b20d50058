/**
 * Key/value store shared between steps. The Motia `ctx.state` manager
 * satisfies it.
 */
export interface StateStore {
  get<T>(groupId: string, key: string): Promise<T | null>;
  set<T>(groupId: string, key: string, value: T): Promise<unknown>;
}

export const SYSTEM_STATE_GROUP = "system";
export const PROCESSING_STATS_KEY = "processing-stats";

export interface ProcessingStats {
  videosProcessed: number;
  videosFailed: number;
  eventsDetected: number;
  alertsRaised: number;
  processingTimeTotalMs: number;
  lastProcessedAt: string | null;
}

export const EMPTY_PROCESSING_STATS: Readonly<ProcessingStats> = {
  videosProcessed: 0,
  videosFailed: 0,
  eventsDetected: 0,
  alertsRaised: 0,
  processingTimeTotalMs: 0,
  lastProcessedAt: null,
};

export async function readProcessingStats(state: StateStore): Promise<ProcessingStats> {
  const stored = await state.get<ProcessingStats>(SYSTEM_STATE_GROUP, PROCESSING_STATS_KEY);
  return { ...EMPTY_PROCESSING_STATS, ...stored };
}
