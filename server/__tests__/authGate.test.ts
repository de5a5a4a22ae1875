import { describe, it, expect, vi, beforeEach } from "vitest";
import { AuthGate, isAllowedDomain } from "../auth/authGate";
import { setAdminFlag } from "../auth/adminTools";
import { SessionStore } from "../auth/sessionStore";
import { MemStore } from "../store/memStore";
import { ManualClock } from "../utils/clock";
import { AuthError, NotFoundError, ValidationError } from "../utils/errorHandler";

describe("isAllowedDomain", () => {
  const domains = ["walkeradvertising.com"];

  it("compares the domain case-insensitively", () => {
    expect(isAllowedDomain("bob@WalkerAdvertising.COM", domains)).toBe(true);
  });

  it("rejects other and look-alike domains", () => {
    expect(isAllowedDomain("bob@example.com", domains)).toBe(false);
    expect(isAllowedDomain("bob@mail.walkeradvertising.com", domains)).toBe(false);
    expect(isAllowedDomain("walkeradvertising.com", domains)).toBe(false);
  });
});

describe("AuthGate", () => {
  let store: MemStore;
  let sessions: SessionStore;
  let gate: AuthGate;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    store = new MemStore();
    sessions = new SessionStore(store, new ManualClock(new Date("2024-06-01T09:00:00Z")));
    gate = new AuthGate(store, sessions, { allowedDomains: ["walkeradvertising.com"] });
  });

  it("registers an account on an allowed domain", async () => {
    const user = await gate.register("a@walkeradvertising.com", "pw1234", "Alice");

    expect(user).toMatchObject({ email: "a@walkeradvertising.com", displayName: "Alice", isAdmin: false });
    expect(store.rows("users")[0].password_hash).not.toBe("pw1234");
  });

  it("normalizes the email before registering", async () => {
    const user = await gate.register("  A@WalkerAdvertising.com ", "pw1234", "Alice");

    expect(user.email).toBe("a@walkeradvertising.com");
  });

  it("refuses registration from other domains", async () => {
    await expect(gate.register("a@example.com", "pw1234", "Alice"))
      .rejects.toMatchObject({ code: "DomainRestricted", statusCode: 403 });
    expect(store.rows("users")).toHaveLength(0);
  });

  it("refuses a duplicate account", async () => {
    await gate.register("a@walkeradvertising.com", "pw1234", "Alice");

    await expect(gate.register("A@walkeradvertising.com", "other-pw", "Alice Again"))
      .rejects.toMatchObject({ code: "DuplicateAccount" });
  });

  it("rejects short passwords and malformed emails", async () => {
    await expect(gate.register("a@walkeradvertising.com", "pw1", "Alice")).rejects.toBeInstanceOf(ValidationError);
    await expect(gate.register("not-an-email", "pw1234", "Alice")).rejects.toBeInstanceOf(ValidationError);
  });

  it("authenticates with the right password only", async () => {
    await gate.register("a@walkeradvertising.com", "pw1234", "Alice");

    await expect(gate.authenticate("a@walkeradvertising.com", "pw1234"))
      .resolves.toMatchObject({ displayName: "Alice" });
    await expect(gate.authenticate("a@walkeradvertising.com", "wrong"))
      .rejects.toMatchObject({ code: "InvalidCredentials" });
  });

  it("gives unknown emails the same error as wrong passwords", async () => {
    const error = await gate.authenticate("nobody@walkeradvertising.com", "pw1234").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ code: "InvalidCredentials", message: "Invalid email or password." });
  });

  it("requires both email and password", async () => {
    await expect(gate.authenticate("", "")).rejects.toBeInstanceOf(ValidationError);
  });

  it("logs in and validates the session", async () => {
    await gate.register("a@walkeradvertising.com", "pw1234", "Alice");

    const result = await gate.login("A@WalkerAdvertising.com", "pw1234");
    expect(result.expiresAt.toISOString()).toBe("2024-06-08T09:00:00.000Z");

    const session = await sessions.validate(result.token);
    expect(session).toMatchObject({
      userId: result.user.id,
      email: "a@walkeradvertising.com",
      displayName: "Alice",
      isAdmin: false,
    });
    expect(gate.checkAdmin(session)).toBe(false);
  });

  it("logs out", async () => {
    await gate.register("a@walkeradvertising.com", "pw1234", "Alice");
    const { token } = await gate.login("a@walkeradvertising.com", "pw1234");

    await gate.logout(token);

    expect(await sessions.validate(token)).toBeNull();
  });

  it("grants admin through the out-of-band flag", async () => {
    await gate.register("a@walkeradvertising.com", "pw1234", "Alice");
    const { token } = await gate.login("a@walkeradvertising.com", "pw1234");

    await setAdminFlag(store, "a@walkeradvertising.com", true);

    expect(gate.checkAdmin(await sessions.validate(token))).toBe(true);
    expect(gate.checkAdmin(null)).toBe(false);
  });

  it("reports an unknown user when setting the admin flag", async () => {
    await expect(setAdminFlag(store, "ghost@walkeradvertising.com", true))
      .rejects.toThrow(new NotFoundError("User ghost@walkeradvertising.com"));
  });
});
