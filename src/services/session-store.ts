import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { MalformedCredentialsError } from "../core/errors";
import { logger } from "../core/logger";

const SameSiteSchema = z
  .string()
  .optional()
  .transform((value): SessionCookie["sameSite"] => {
    switch (value?.toLowerCase()) {
      case "strict":
        return "Strict";
      case "lax":
        return "Lax";
      case "none":
      case "no_restriction":
        return "None";
      default:
        return undefined;
    }
  });

// Browser-extension export ("Cookie-Editor" and similar).
const ExportedCookieSchema = z.object({
  domain: z.string().min(1),
  name: z.string().min(1),
  value: z.string(),
  path: z.string().optional(),
  expirationDate: z.number().optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
  sameSite: SameSiteSchema,
  session: z.boolean().optional(),
});

// Playwright storageState cookies.
const StorageStateCookieSchema = z.object({
  domain: z.string().min(1),
  name: z.string().min(1),
  value: z.string(),
  path: z.string().optional(),
  expires: z.number().optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
  sameSite: SameSiteSchema,
});

const CookieFileSchema = z.union([
  z.array(ExportedCookieSchema),
  z.object({ cookies: z.array(StorageStateCookieSchema) }),
]);

export interface SessionCookie {
  domain: string;
  name: string;
  value: string;
  path: string;
  /** Unix seconds; null for session cookies. */
  expiry: number | null;
  secure: boolean;
  httpOnly: boolean;
  sameSite: "Strict" | "Lax" | "None" | undefined;
}

export interface CredentialBundle {
  status: "ready";
  source: string;
  cookies: readonly SessionCookie[];
}

export interface RequiresInteractiveLogin {
  status: "requires_interactive_login";
  source: string;
}

export type SessionLoadResult = CredentialBundle | RequiresInteractiveLogin;

function toSessionCookies(parsed: z.infer<typeof CookieFileSchema>): SessionCookie[] {
  if (Array.isArray(parsed)) {
    return parsed.map((cookie) => ({
      domain: cookie.domain,
      name: cookie.name,
      value: cookie.value,
      path: cookie.path ?? "/",
      expiry: cookie.session || cookie.expirationDate === undefined ? null : Math.floor(cookie.expirationDate),
      secure: cookie.secure ?? false,
      httpOnly: cookie.httpOnly ?? false,
      sameSite: cookie.sameSite,
    }));
  }

  return parsed.cookies.map((cookie) => ({
    domain: cookie.domain,
    name: cookie.name,
    value: cookie.value,
    path: cookie.path ?? "/",
    expiry: cookie.expires === undefined || cookie.expires < 0 ? null : Math.floor(cookie.expires),
    secure: cookie.secure ?? false,
    httpOnly: cookie.httpOnly ?? false,
    sameSite: cookie.sameSite,
  }));
}

export function parseCookieFile(json: string, source: string): CredentialBundle {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid JSON";
    throw new MalformedCredentialsError(`Cookie file ${source} is not valid JSON: ${message}`);
  }

  const parsed = CookieFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unexpected shape";
    throw new MalformedCredentialsError(`Cookie file ${source} has an unexpected format (${where})`);
  }

  const cookies = toSessionCookies(parsed.data);
  if (cookies.length === 0) {
    throw new MalformedCredentialsError(`Cookie file ${source} contains no cookies`, "CREDENTIALS_EMPTY");
  }

  return { status: "ready", source, cookies: Object.freeze(cookies) };
}

export function toExportedCookies(cookies: readonly SessionCookie[]): Array<z.input<typeof ExportedCookieSchema>> {
  return cookies.map((cookie) => ({
    domain: cookie.domain,
    name: cookie.name,
    value: cookie.value,
    path: cookie.path,
    ...(cookie.expiry === null ? { session: true } : { expirationDate: cookie.expiry, session: false }),
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    ...(cookie.sameSite ? { sameSite: cookie.sameSite.toLowerCase() } : {}),
  }));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SessionStore {
  constructor(private cookiesPath: string) {}

  get path(): string {
    return this.cookiesPath;
  }

  async load(): Promise<SessionLoadResult> {
    let json: string;
    try {
      json = await readFile(this.cookiesPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn({ path: this.cookiesPath }, "No cookie file found, interactive login required");
        return { status: "requires_interactive_login", source: this.cookiesPath };
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedCredentialsError(`Cookie file ${this.cookiesPath} could not be read: ${message}`, "CREDENTIALS_UNREADABLE");
    }

    const bundle = parseCookieFile(json, this.cookiesPath);
    logger.info({ path: this.cookiesPath, cookieCount: bundle.cookies.length }, "Loaded credential bundle");
    return bundle;
  }

  /** Writes cookies back to disk. Only called on an explicit operator export. */
  async save(cookies: readonly SessionCookie[]): Promise<void> {
    await mkdir(dirname(this.cookiesPath), { recursive: true });
    await writeFile(this.cookiesPath, JSON.stringify(toExportedCookies(cookies), null, 2), "utf-8");
    logger.info({ path: this.cookiesPath, cookieCount: cookies.length }, "Exported session cookies");
  }
}

export function cookieMatchesHost(cookie: SessionCookie, hosts: readonly string[]): boolean {
  const domain = cookie.domain.replace(/^\./, "").toLowerCase();
  return hosts.some((host) => host === domain || host.endsWith(`.${domain}`));
}

export function isExpired(cookie: SessionCookie, nowSeconds: number): boolean {
  return cookie.expiry !== null && cookie.expiry <= nowSeconds;
}
