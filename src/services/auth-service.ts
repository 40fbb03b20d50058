import type { AuthSession, AuthUser, UserProfile } from "../shared/interfaces";
import type { ProfileRepository } from "../repositories/profile-repository";
import type { ServiceLogger } from "../shared/logger";
import { UnauthorizedError, errorMessage } from "../shared/errors";

export interface SignUpResult {
  user: AuthUser;
  /** Null while the provider waits for email confirmation. */
  session: AuthSession | null;
}

/** The external identity provider issuing and verifying access tokens. */
export interface AuthProvider {
  signUp(email: string, password: string, fullName: string | null): Promise<SignUpResult>;
  signIn(email: string, password: string): Promise<AuthSession>;
  refresh(refreshToken: string): Promise<AuthSession>;
  signOut(accessToken: string): Promise<void>;
  getUser(accessToken: string): Promise<AuthUser | null>;
}

export class AuthService {
  constructor(
    private readonly provider: AuthProvider,
    private readonly profiles: ProfileRepository,
    private readonly logger: ServiceLogger
  ) {}

  async signUp(email: string, password: string, fullName: string | null): Promise<SignUpResult> {
    const result = await this.provider.signUp(email, password, fullName);
    await this.profiles.upsert({
      id: result.user.id,
      email: result.user.email,
      fullName: result.user.fullName ?? fullName,
    });
    this.logger.info("User signed up", {
      userId: result.user.id,
      confirmed: result.session !== null,
    });
    return result;
  }

  async login(email: string, password: string): Promise<AuthSession> {
    return this.provider.signIn(email, password);
  }

  async refresh(refreshToken: string): Promise<AuthSession> {
    return this.provider.refresh(refreshToken);
  }

  /** Revokes the session when possible; logout never fails for the caller. */
  async logout(accessToken: string | null): Promise<void> {
    if (!accessToken) return;
    try {
      await this.provider.signOut(accessToken);
    } catch (error) {
      this.logger.warn("Session revocation failed", { error: errorMessage(error) });
    }
  }

  async authenticate(accessToken: string | null): Promise<AuthUser> {
    if (!accessToken) throw new UnauthorizedError();
    const user = await this.provider.getUser(accessToken);
    if (!user) throw new UnauthorizedError();
    return user;
  }

  async profile(userId: string): Promise<UserProfile | null> {
    return this.profiles.findById(userId);
  }

  /** The caller's profile, falling back to the identity from the token. */
  async me(user: AuthUser): Promise<AuthUser> {
    const profile = await this.profiles.findById(user.id);
    if (!profile) return user;
    return { id: profile.id, email: profile.email, fullName: profile.fullName ?? user.fullName };
  }
}
