export const POLL_INTERVAL_MS = 3000;

interface PolledVideo {
  upload_status: string;
}

export interface PollerOptions<V extends PolledVideo> {
  load: () => Promise<V[]>;
  onUpdate: (videos: V[]) => void;
  onError?: (error: unknown) => void;
  intervalMs?: number;
}

/**
 * Re-fetches the video list on a fixed interval while any video is
 * processing. No backoff and no cap; only `stop()` ends it early.
 */
export class ProcessingPoller<V extends PolledVideo> {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: Promise<void> | null = null;
  private generation = 0;

  constructor(private readonly options: PollerOptions<V>) {}

  get active(): boolean {
    return this.timer !== null || this.pending !== null;
  }

  /** Schedules polling when the given list still has work in progress. */
  watch(videos: readonly V[]): void {
    if (this.active) return;
    if (videos.some((video) => video.upload_status === "processing")) {
      this.schedule();
    }
  }

  stop(): void {
    this.generation += 1;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pending = null;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.poll();
    }, this.options.intervalMs ?? POLL_INTERVAL_MS);
  }

  private async poll(): Promise<void> {
    const generation = this.generation;
    let keepPolling = true;
    try {
      const videos = await this.options.load();
      if (generation !== this.generation) return;
      this.options.onUpdate(videos);
      keepPolling = videos.some((video) => video.upload_status === "processing");
    } catch (error) {
      if (generation !== this.generation) return;
      this.options.onError?.(error);
    }
    this.pending = null;
    if (keepPolling) this.schedule();
  }
}
