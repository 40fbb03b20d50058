import { vi } from "vitest";
import type { Readable } from "node:stream";
import type {
  AuthSession,
  AuthUser,
  DetectionEvent,
  EventFeedback,
  NewDetectionEvent,
  NewVideo,
  UserProfile,
  UserSettings,
  UserSettingsRecord,
  VideoRecord,
  VideoStatus,
} from "../../src/shared/interfaces";
import type { StatusPatch, VideoRepository } from "../../src/repositories/video-repository";
import type { EventQuery, EventRepository } from "../../src/repositories/event-repository";
import type { SettingsRepository } from "../../src/repositories/settings-repository";
import type { ProfileRepository } from "../../src/repositories/profile-repository";
import type { StorageAdapter } from "../../src/shared/storage";
import type { ServiceLogger } from "../../src/shared/logger";
import type { StateStore } from "../../src/shared/state";
import type { AnomalyScorer, ScoringRequest, ScoringResult } from "../../src/services/scorer";
import type { AuthProvider, SignUpResult } from "../../src/services/auth-service";
import { UnauthorizedError } from "../../src/shared/errors";

export const NOW = new Date("2026-03-01T12:00:00.000Z");
export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAgo(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY_MS);
}

export function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies ServiceLogger;
}

export class InMemoryVideoRepository implements VideoRepository {
  readonly records = new Map<string, VideoRecord>();
  failCreate: Error | null = null;

  constructor(private readonly now: () => Date = () => NOW) {}

  /** Inserts a fully formed record, e.g. one with a backdated createdAt. */
  seed(record: Partial<VideoRecord> & Pick<VideoRecord, "id" | "userId">): VideoRecord {
    const filename = record.filename ?? `${record.id}.mp4`;
    const full: VideoRecord = {
      filename,
      originalName: "clip.mp4",
      filePath: `${record.userId}/${filename}`,
      fileUrl: null,
      fileSize: 1024,
      durationSeconds: null,
      fps: null,
      resolution: null,
      status: "uploaded",
      storageProvider: "local",
      errorMessage: null,
      createdAt: this.now(),
      updatedAt: this.now(),
      ...record,
    };
    this.records.set(full.id, full);
    return full;
  }

  async create(input: NewVideo): Promise<VideoRecord> {
    if (this.failCreate) throw this.failCreate;
    return this.seed({ ...input, status: input.status ?? "uploaded" });
  }

  async findById(id: string): Promise<VideoRecord | null> {
    return this.records.get(id) ?? null;
  }

  async listByUser(userId: string, limit?: number): Promise<VideoRecord[]> {
    const list = [...this.records.values()]
      .filter((video) => video.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return limit === undefined ? list : list.slice(0, limit);
  }

  async listCreatedBefore(userId: string, cutoff: Date): Promise<VideoRecord[]> {
    return [...this.records.values()]
      .filter((video) => video.userId === userId && video.createdAt < cutoff)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async countByStatus(status: VideoStatus, userId?: string): Promise<number> {
    return [...this.records.values()].filter(
      (video) => video.status === status && (!userId || video.userId === userId)
    ).length;
  }

  async transitionStatus(
    id: string,
    from: readonly VideoStatus[],
    to: VideoStatus,
    patch: StatusPatch = {}
  ): Promise<VideoRecord | null> {
    const current = this.records.get(id);
    if (!current || !from.includes(current.status)) return null;
    const updated: VideoRecord = {
      ...current,
      durationSeconds: patch.durationSeconds !== undefined ? patch.durationSeconds : current.durationSeconds,
      fps: patch.fps !== undefined ? patch.fps : current.fps,
      resolution: patch.resolution !== undefined ? patch.resolution : current.resolution,
      errorMessage: patch.errorMessage !== undefined ? patch.errorMessage : current.errorMessage,
      status: to,
      updatedAt: this.now(),
    };
    this.records.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

export class InMemoryEventRepository implements EventRepository {
  readonly records = new Map<string, DetectionEvent>();
  private sequence = 0;

  constructor(private readonly now: () => Date = () => NOW) {}

  async insertMany(events: NewDetectionEvent[]): Promise<DetectionEvent[]> {
    return events.map((event) => {
      this.sequence += 1;
      const stored: DetectionEvent = {
        ...event,
        id: `event-${this.sequence}`,
        isFalsePositive: null,
        feedbackScore: null,
        feedbackComments: null,
        createdAt: this.now(),
      };
      this.records.set(stored.id, stored);
      return stored;
    });
  }

  async listByVideo(videoId: string): Promise<DetectionEvent[]> {
    return [...this.records.values()]
      .filter((event) => event.videoId === videoId)
      .sort((a, b) => a.timestampSeconds - b.timestampSeconds);
  }

  async listByUser(userId: string, query: EventQuery): Promise<DetectionEvent[]> {
    const list = [...this.records.values()]
      .filter((event) => event.userId === userId)
      .filter((event) => !query.eventType || event.eventType === query.eventType)
      .reverse();
    return query.limit === undefined ? list : list.slice(0, query.limit);
  }

  async findById(id: string): Promise<DetectionEvent | null> {
    return this.records.get(id) ?? null;
  }

  async applyFeedback(id: string, feedback: EventFeedback): Promise<DetectionEvent | null> {
    const current = this.records.get(id);
    if (!current) return null;
    const updated: DetectionEvent = {
      ...current,
      isFalsePositive: feedback.isFalsePositive,
      feedbackScore: feedback.feedbackScore,
      feedbackComments: feedback.comments ?? null,
    };
    this.records.set(id, updated);
    return updated;
  }

  async deleteByVideo(videoId: string): Promise<number> {
    let removed = 0;
    for (const [id, event] of this.records) {
      if (event.videoId === videoId) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}

export class InMemorySettingsRepository implements SettingsRepository {
  readonly records = new Map<string, UserSettings>();

  async findByUser(userId: string): Promise<UserSettings | null> {
    const stored = this.records.get(userId);
    return stored ? { ...stored } : null;
  }

  async upsert(userId: string, settings: UserSettings): Promise<UserSettings> {
    this.records.set(userId, { ...settings });
    return { ...settings };
  }

  async listAutoDeleteEnabled(): Promise<UserSettingsRecord[]> {
    return [...this.records.entries()]
      .filter(([, settings]) => settings.autoDeleteOldVideos)
      .map(([userId, settings]) => ({ userId, ...settings }));
  }
}

export class InMemoryProfileRepository implements ProfileRepository {
  readonly records = new Map<string, UserProfile>();

  async upsert(profile: Omit<UserProfile, "createdAt">): Promise<UserProfile> {
    const stored: UserProfile = {
      ...profile,
      createdAt: this.records.get(profile.id)?.createdAt ?? NOW,
    };
    this.records.set(profile.id, stored);
    return stored;
  }

  async findById(id: string): Promise<UserProfile | null> {
    return this.records.get(id) ?? null;
  }
}

export class MemoryStorage implements StorageAdapter {
  readonly provider = "local" as const;
  readonly blobs = new Map<string, Buffer>();
  failDeleteFor = new Set<string>();

  async saveStream(stream: Readable, key: string): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    this.blobs.set(key, Buffer.concat(chunks));
    return key;
  }

  async saveBuffer(buffer: Buffer, key: string): Promise<string> {
    this.blobs.set(key, buffer);
    return key;
  }

  async getBuffer(key: string): Promise<Buffer> {
    const blob = this.blobs.get(key);
    if (!blob) throw new Error(`File not found: ${key}`);
    return blob;
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  async delete(key: string): Promise<void> {
    if (this.failDeleteFor.has(key)) throw new Error(`Storage unavailable for ${key}`);
    this.blobs.delete(key);
  }

  async getPublicUrl(key: string): Promise<string> {
    return `http://files.test/${key}`;
  }
}

export class MemoryState implements StateStore {
  readonly values = new Map<string, unknown>();

  async get<T>(groupId: string, key: string): Promise<T | null> {
    const value = this.values.get(`${groupId}:${key}`);
    // Each key is only ever written with one shape by the code under test.
    return value === undefined ? null : (value as T);
  }

  async set<T>(groupId: string, key: string, value: T): Promise<T> {
    this.values.set(`${groupId}:${key}`, value);
    return value;
  }
}

export class StubScorer implements AnomalyScorer {
  readonly requests: ScoringRequest[] = [];

  constructor(private readonly result: ScoringResult | Error) {}

  async score(request: ScoringRequest): Promise<ScoringResult> {
    this.requests.push(request);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class StubAuthProvider implements AuthProvider {
  readonly users = new Map<string, AuthUser>();
  signOut = vi.fn(async (_token: string): Promise<void> => undefined);

  addUser(token: string, user: AuthUser): void {
    this.users.set(token, user);
  }

  private session(user: AuthUser): AuthSession {
    return { accessToken: `token-${user.id}`, refreshToken: `refresh-${user.id}`, expiresIn: 3600, user };
  }

  async signUp(email: string, _password: string, fullName: string | null): Promise<SignUpResult> {
    const user: AuthUser = { id: `user-${this.users.size + 1}`, email, fullName };
    const session = this.session(user);
    this.users.set(session.accessToken, user);
    return { user, session };
  }

  async signIn(email: string, password: string): Promise<AuthSession> {
    const user = [...this.users.values()].find((candidate) => candidate.email === email);
    if (!user || password !== "test-password") throw new UnauthorizedError("Invalid email or password");
    return this.session(user);
  }

  async refresh(refreshToken: string): Promise<AuthSession> {
    const user = [...this.users.values()].find((candidate) => `refresh-${candidate.id}` === refreshToken);
    if (!user) throw new UnauthorizedError("Invalid refresh token");
    return this.session(user);
  }

  async getUser(accessToken: string): Promise<AuthUser | null> {
    return this.users.get(accessToken) ?? null;
  }
}
