import { describe, expect, it } from "vitest";
import { createHarness } from "../support/harness";

describe("AuthService", () => {
  it("rejects missing and unknown tokens", async () => {
    const h = createHarness();

    await expect(h.services.auth.authenticate(null)).rejects.toMatchObject({
      status: 401,
      message: "Could not validate credentials",
    });
    await expect(h.services.auth.authenticate("unknown")).rejects.toMatchObject({ status: 401 });
  });

  it("creates a profile on signup and serves it from me()", async () => {
    const h = createHarness();
    const { user, session } = await h.services.auth.signUp("guard@example.test", "test-password", "Night Guard");

    expect(session?.accessToken).toBe("token-user-1");
    expect(h.profiles.records.get(user.id)).toMatchObject({
      email: "guard@example.test",
      fullName: "Night Guard",
    });

    const authed = await h.services.auth.authenticate("token-user-1");
    expect(await h.services.auth.me(authed)).toEqual({
      id: "user-1",
      email: "guard@example.test",
      fullName: "Night Guard",
    });
  });

  it("logs in with the provider's credentials check", async () => {
    const h = createHarness();
    h.auth.addUser("token-a", { id: "a", email: "a@example.test", fullName: null });

    const session = await h.services.auth.login("a@example.test", "test-password");
    expect(session.refreshToken).toBe("refresh-a");
    await expect(h.services.auth.login("a@example.test", "wrong")).rejects.toMatchObject({ status: 401 });
  });

  it("never fails logout", async () => {
    const h = createHarness();
    h.auth.signOut.mockRejectedValueOnce(new Error("session already gone"));

    await expect(h.services.auth.logout("token-a")).resolves.toBeUndefined();
    expect(h.logger.warn).toHaveBeenCalledWith("Session revocation failed", { error: "session already gone" });

    await h.services.auth.logout(null);
    expect(h.auth.signOut).toHaveBeenCalledTimes(1);
  });
});
