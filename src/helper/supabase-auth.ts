import {
  createClient,
  type Session,
  type SupabaseClient,
  type User,
} from "@supabase/supabase-js";
import type { AuthSession, AuthUser } from "../shared/interfaces";
import { BadRequestError, UnauthorizedError } from "../shared/errors";
import type { AuthProvider, SignUpResult } from "../services/auth-service";

function toAuthUser(user: User): AuthUser {
  const metadata: Record<string, unknown> = user.user_metadata ?? {};
  const fullName = metadata["full_name"];
  return {
    id: user.id,
    email: user.email ?? "",
    fullName: typeof fullName === "string" ? fullName : null,
  };
}

function toAuthSession(session: Session): AuthSession {
  return {
    accessToken: session.access_token,
    refreshToken: session.refresh_token,
    expiresIn: session.expires_in,
    user: toAuthUser(session.user),
  };
}

/** Supabase Auth behind the `AuthProvider` seam. */
export class SupabaseAuthProvider implements AuthProvider {
  private client: SupabaseClient;

  constructor(url: string, anonKey: string) {
    this.client = createClient(url, anonKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  async signUp(email: string, password: string, fullName: string | null): Promise<SignUpResult> {
    const { data, error } = await this.client.auth.signUp({
      email,
      password,
      options: { data: fullName ? { full_name: fullName } : {} },
    });
    if (error) throw new BadRequestError(error.message);
    if (!data.user) throw new BadRequestError("Signup failed");
    return {
      user: toAuthUser(data.user),
      session: data.session ? toAuthSession(data.session) : null,
    };
  }

  async signIn(email: string, password: string): Promise<AuthSession> {
    const { data, error } = await this.client.auth.signInWithPassword({ email, password });
    if (error || !data.session) {
      throw new UnauthorizedError("Invalid email or password");
    }
    return toAuthSession(data.session);
  }

  async refresh(refreshToken: string): Promise<AuthSession> {
    const { data, error } = await this.client.auth.refreshSession({
      refresh_token: refreshToken,
    });
    if (error || !data.session) {
      throw new UnauthorizedError("Invalid refresh token");
    }
    return toAuthSession(data.session);
  }

  async signOut(accessToken: string): Promise<void> {
    const { error } = await this.client.auth.admin.signOut(accessToken);
    if (error) throw error;
  }

  async getUser(accessToken: string): Promise<AuthUser | null> {
    const { data, error } = await this.client.auth.getUser(accessToken);
    if (error || !data.user) return null;
    return toAuthUser(data.user);
  }
}
