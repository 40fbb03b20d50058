import type {
  CleanupPreviewResponse,
  CleanupRunResponse,
  EventResponse,
  FeedbackRequest,
  ProcessResponse,
  SessionResponse,
  SettingsResponse,
  SettingsUpdate,
  StatsResponse,
  SystemStatusResponse,
  UserResponse,
  VideoAnalysisResponse,
  VideoResponse,
} from "./types";

const API_PREFIX = "/api/v1";

/**
 * `network`: no response arrived. `http`: the server answered with an error
 * status. `setup`: the request could not be built or sent.
 */
export type ApiErrorKind = "network" | "http" | "setup";

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status: number | null;

  constructor(kind: ApiErrorKind, message: string, status: number | null = null) {
    super(message);
    this.name = "ApiError";
    this.kind = kind;
    this.status = status;
  }
}

export interface TokenStore {
  getAccessToken(): string | null;
  getRefreshToken(): string | null;
  setTokens(accessToken: string, refreshToken: string): void;
  clear(): void;
}

export class MemoryTokenStore implements TokenStore {
  private accessToken: string | null = null;
  private refreshToken: string | null = null;

  getAccessToken() {
    return this.accessToken;
  }

  getRefreshToken() {
    return this.refreshToken;
  }

  setTokens(accessToken: string, refreshToken: string) {
    this.accessToken = accessToken;
    this.refreshToken = refreshToken;
  }

  clear() {
    this.accessToken = null;
    this.refreshToken = null;
  }
}

export interface ApiClientOptions {
  baseUrl: string;
  tokens?: TokenStore;
  /** Runs after a 401 cleared the stored tokens; browsers redirect to /login. */
  onUnauthorized?: () => void;
  fetch?: typeof fetch;
}

function toBase64(data: Uint8Array): string {
  let binary = "";
  for (const byte of data) binary += String.fromCharCode(byte);
  return btoa(binary);
}

async function errorText(response: Response): Promise<string> {
  const body: unknown = await response.json().catch(() => null);
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return `Request failed: ${response.status}`;
}

export class SentinelApiClient {
  private baseUrl: string;
  private fetchImpl: typeof fetch;
  readonly tokens: TokenStore;

  constructor(private readonly options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.tokens = options.tokens ?? new MemoryTokenStore();
    // Called unbound: browsers reject fetch invoked with any other receiver.
    const fetchFn = options.fetch ?? fetch;
    this.fetchImpl = (input, init) => fetchFn(input, init);
  }

  private async request<T>(path: string, init: { method?: string; body?: unknown } = {}): Promise<T> {
    let request: Request;
    try {
      const headers: Record<string, string> = {};
      const token = this.tokens.getAccessToken();
      if (token) headers["Authorization"] = `Bearer ${token}`;
      if (init.body !== undefined) headers["Content-Type"] = "application/json";

      request = new Request(`${this.baseUrl}${API_PREFIX}${path}`, {
        method: init.method ?? "GET",
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (error) {
      throw new ApiError("setup", error instanceof Error ? error.message : String(error));
    }

    let response: Response;
    try {
      response = await this.fetchImpl(request);
    } catch {
      throw new ApiError("network", "No response from server");
    }

    if (response.status === 401) {
      this.tokens.clear();
      this.options.onUnauthorized?.();
    }
    if (!response.ok) {
      throw new ApiError("http", await errorText(response), response.status);
    }
    return response.json();
  }

  // Auth
  async login(email: string, password: string): Promise<SessionResponse> {
    const session = await this.request<SessionResponse>("/auth/login", {
      method: "POST",
      body: { email, password },
    });
    this.tokens.setTokens(session.access_token, session.refresh_token);
    return session;
  }

  async signup(email: string, password: string, fullName?: string) {
    const result = await this.request<SessionResponse | { message: string; user: UserResponse }>(
      "/auth/signup",
      { method: "POST", body: { email, password, full_name: fullName } }
    );
    if ("access_token" in result) {
      this.tokens.setTokens(result.access_token, result.refresh_token);
    }
    return result;
  }

  async refresh(): Promise<SessionResponse> {
    const refreshToken = this.tokens.getRefreshToken();
    if (!refreshToken) throw new ApiError("setup", "No refresh token stored");
    const session = await this.request<SessionResponse>("/auth/refresh", {
      method: "POST",
      body: { refresh_token: refreshToken },
    });
    this.tokens.setTokens(session.access_token, session.refresh_token);
    return session;
  }

  async logout(): Promise<void> {
    try {
      await this.request<{ message: string }>("/auth/logout", { method: "POST" });
    } finally {
      this.tokens.clear();
    }
  }

  async me(): Promise<UserResponse> {
    return this.request("/auth/me");
  }

  // Videos
  async uploadVideo(filename: string, contentType: string, data: Uint8Array): Promise<VideoResponse> {
    return this.request("/videos/upload", {
      method: "POST",
      body: {
        filename,
        content_type: contentType,
        data: toBase64(data),
      },
    });
  }

  async listVideos(limit = 50): Promise<VideoResponse[]> {
    const { videos } = await this.request<{ videos: VideoResponse[] }>(`/videos?limit=${limit}`);
    return videos;
  }

  async getVideo(id: string): Promise<VideoResponse> {
    return this.request(`/videos/${encodeURIComponent(id)}`);
  }

  async deleteVideo(id: string): Promise<{ message: string; events_deleted: number }> {
    return this.request(`/videos/${encodeURIComponent(id)}`, { method: "DELETE" });
  }

  async processVideo(id: string, reprocess = false): Promise<ProcessResponse> {
    const query = reprocess ? "?reprocess=true" : "";
    return this.request(`/videos/${encodeURIComponent(id)}/process${query}`, { method: "POST" });
  }

  async getVideoAnalysis(id: string): Promise<VideoAnalysisResponse> {
    return this.request(`/videos/${encodeURIComponent(id)}/analysis`);
  }

  async getVideoEvents(id: string): Promise<EventResponse[]> {
    const { events } = await this.request<{ events: EventResponse[] }>(
      `/videos/${encodeURIComponent(id)}/events`
    );
    return events;
  }

  /** URL for a <video> element, which cannot send an Authorization header. */
  streamUrl(id: string): string {
    const token = this.tokens.getAccessToken();
    const query = token ? `?token=${encodeURIComponent(token)}` : "";
    return `${this.baseUrl}${API_PREFIX}/videos/${encodeURIComponent(id)}/stream${query}`;
  }

  // Events
  async listEvents(limit = 100, eventType?: string): Promise<EventResponse[]> {
    const params = new URLSearchParams({ limit: String(limit) });
    if (eventType) params.set("event_type", eventType);
    const { events } = await this.request<{ events: EventResponse[] }>(`/events?${params}`);
    return events;
  }

  async submitFeedback(eventId: string, feedback: FeedbackRequest) {
    return this.request<{ message: string; event: EventResponse }>(
      `/events/${encodeURIComponent(eventId)}/feedback`,
      { method: "POST", body: feedback }
    );
  }

  // Dashboard
  async getStats(): Promise<StatsResponse> {
    return this.request("/analytics/stats");
  }

  async getSystemStatus(): Promise<SystemStatusResponse> {
    return this.request("/system/status");
  }

  async getSettings(): Promise<SettingsResponse> {
    return this.request("/settings");
  }

  async updateSettings(update: SettingsUpdate): Promise<SettingsResponse> {
    return this.request("/settings", { method: "PUT", body: update });
  }

  async previewCleanup(): Promise<CleanupPreviewResponse> {
    return this.request("/cleanup/preview");
  }

  async runCleanup(): Promise<CleanupRunResponse> {
    return this.request("/cleanup/run", { method: "POST" });
  }
}
