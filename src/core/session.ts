/**
 * Session resolution: credentials → personal and team sessions.
 */
import { z } from "zod";
import type {
  AccountInfo,
  Credentials,
  SessionFactory,
  SessionScope,
  StorageBackend,
} from "../storage/backend.js";
import { TimedStorage, withDeadline } from "../storage/deadline.js";
import { SessionFault, errorMessage } from "./exceptions.js";

// ---------------------------------------------------------------------------
// Auth payload
// ---------------------------------------------------------------------------

const TokenSchema = z.string().trim().min(1);

export const AuthPayloadSchema = z.union([
  TokenSchema,
  z
    .object({
      access_token: TokenSchema.optional(),
      access: TokenSchema.optional(),
      refresh_token: TokenSchema.optional(),
      refresh: TokenSchema.optional(),
    })
    .refine((p) => p.access_token !== undefined || p.access !== undefined, {
      message: "auth payload carries no access token",
    }),
]);

export type AuthPayload = z.infer<typeof AuthPayloadSchema>;

/**
 * Normalize a token payload. `access_token`/`refresh_token` win over the
 * legacy `access`/`refresh` keys.
 */
export function parseCredentials(
  auth: unknown,
  appKey?: string,
  appSecret?: string,
): Credentials {
  const parsed = AuthPayloadSchema.safeParse(auth);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    throw new SessionFault(`invalid auth payload: ${detail}`);
  }

  const payload = parsed.data;
  if (typeof payload === "string") return { accessToken: payload };

  const accessToken = payload.access_token ?? payload.access;
  if (accessToken === undefined) {
    throw new SessionFault("auth payload carries no access token");
  }

  const credentials: Credentials = { accessToken };
  const refreshToken = payload.refresh_token ?? payload.refresh;
  if (refreshToken !== undefined && appKey && appSecret) {
    credentials.refreshToken = refreshToken;
    credentials.appKey = appKey;
    credentials.appSecret = appSecret;
  }
  return credentials;
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface Sessions {
  personal: StorageBackend;
  team: StorageBackend;
  account: AccountInfo;
}

export interface SelectedSession {
  scope: SessionScope;
  storage: StorageBackend;
}

async function open(
  factory: SessionFactory,
  credentials: Credentials,
  scope: SessionScope,
  timeoutMs?: number,
): Promise<StorageBackend> {
  if (timeoutMs === undefined) {
    return factory.authenticate(credentials, scope);
  }
  const storage = await withDeadline(`authenticate ${scope.kind}`, timeoutMs, () =>
    factory.authenticate(credentials, scope),
  );
  return new TimedStorage(storage, timeoutMs);
}

/**
 * Open the personal session, look up the account's root namespace, then open
 * a team session rooted there. Any failure is a SessionFault.
 */
export async function resolveSessions(
  factory: SessionFactory,
  credentials: Credentials,
  timeoutMs?: number,
): Promise<Sessions> {
  try {
    const personal = await open(factory, credentials, { kind: "personal" }, timeoutMs);
    const account = await personal.whoami();
    const team = await open(
      factory,
      credentials,
      { kind: "team", namespaceId: account.rootNamespaceId },
      timeoutMs,
    );
    return { personal, team, account };
  } catch (err) {
    if (err instanceof SessionFault) throw err;
    throw new SessionFault(errorMessage(err), { cause: err });
  }
}

export function selectSession(
  sessions: Sessions,
  teamFolder: boolean,
): SelectedSession {
  if (teamFolder) {
    return {
      scope: { kind: "team", namespaceId: sessions.account.rootNamespaceId },
      storage: sessions.team,
    };
  }
  return { scope: { kind: "personal" }, storage: sessions.personal };
}
