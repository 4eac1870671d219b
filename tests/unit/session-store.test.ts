import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { MalformedCredentialsError } from "../../src/core/errors";
import {
  SessionStore,
  cookieMatchesHost,
  isExpired,
  parseCookieFile,
  type SessionCookie,
} from "../../src/services/session-store";

const cookie = (overrides: Partial<SessionCookie> = {}): SessionCookie => ({
  domain: ".x.com",
  name: "auth_token",
  value: "test-secret",
  path: "/",
  expiry: null,
  secure: true,
  httpOnly: true,
  sameSite: "None",
  ...overrides,
});

describe("SessionStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "top-posts-session-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should ask for an interactive login when the cookie file is missing", async () => {
    const store = new SessionStore(join(dir, "missing.json"));
    await expect(store.load()).resolves.toEqual({
      status: "requires_interactive_login",
      source: join(dir, "missing.json"),
    });
  });

  it("should load a browser-extension cookie export", async () => {
    const path = join(dir, "cookies.json");
    await writeFile(
      path,
      JSON.stringify([
        {
          domain: ".x.com",
          name: "auth_token",
          value: "test-secret",
          path: "/",
          expirationDate: 1900000000.7,
          secure: true,
          httpOnly: true,
          sameSite: "no_restriction",
          session: false,
        },
        { domain: ".x.com", name: "lang", value: "en", session: true },
      ])
    );

    const session = await new SessionStore(path).load();

    expect(session.status).toBe("ready");
    if (session.status !== "ready") return;
    expect(session.cookies).toEqual([
      cookie({ expiry: 1900000000 }),
      {
        domain: ".x.com",
        name: "lang",
        value: "en",
        path: "/",
        expiry: null,
        secure: false,
        httpOnly: false,
        sameSite: undefined,
      },
    ]);
  });

  it("should load a storage state file", () => {
    const bundle = parseCookieFile(
      JSON.stringify({
        cookies: [{ domain: "x.com", name: "ct0", value: "test-csrf", path: "/", expires: -1, sameSite: "Lax" }],
        origins: [],
      }),
      "state.json"
    );

    expect(bundle.cookies).toEqual([
      {
        domain: "x.com",
        name: "ct0",
        value: "test-csrf",
        path: "/",
        expiry: null,
        secure: false,
        httpOnly: false,
        sameSite: "Lax",
      },
    ]);
  });

  it("should reject invalid JSON", () => {
    expect(() => parseCookieFile("{not json", "broken.json")).toThrow(MalformedCredentialsError);
  });

  it("should reject an unexpected shape", () => {
    try {
      parseCookieFile(JSON.stringify([{ domain: ".x.com", value: "v" }]), "shape.json");
      expect.unreachable("parseCookieFile should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedCredentialsError);
      expect(error).toMatchObject({ code: "MALFORMED_CREDENTIALS" });
    }
  });

  it("should reject an empty cookie list", () => {
    expect(() => parseCookieFile("[]", "empty.json")).toThrow("Cookie file empty.json contains no cookies");
    try {
      parseCookieFile("[]", "empty.json");
    } catch (error) {
      expect(error).toMatchObject({ code: "CREDENTIALS_EMPTY" });
    }
  });

  it("should write cookies that load back unchanged", async () => {
    const path = join(dir, "nested", "cookies.json");
    const store = new SessionStore(path);
    const cookies = [cookie({ expiry: 1900000000 }), cookie({ name: "ct0", sameSite: "Lax", httpOnly: false })];

    await store.save(cookies);
    const session = await store.load();

    expect(session).toEqual({ status: "ready", source: path, cookies });
  });

  describe("cookie helpers", () => {
    it("should match cookies to the target host and its subdomains", () => {
      expect(cookieMatchesHost(cookie({ domain: ".x.com" }), ["x.com"])).toBe(true);
      expect(cookieMatchesHost(cookie({ domain: "x.com" }), ["mobile.x.com"])).toBe(true);
      expect(cookieMatchesHost(cookie({ domain: ".twitter.com" }), ["x.com"])).toBe(false);
    });

    it("should treat session cookies as never expired", () => {
      expect(isExpired(cookie({ expiry: null }), 2000000000)).toBe(false);
      expect(isExpired(cookie({ expiry: 1000 }), 2000)).toBe(true);
      expect(isExpired(cookie({ expiry: 3000 }), 2000)).toBe(false);
    });
  });
});
