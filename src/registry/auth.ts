/**
 * Registry authentication: Basic credentials and Bearer token challenges.
 *
 * A registry answers an unauthenticated request with `401` and a
 * `WWW-Authenticate` header. `Basic` means the configured credentials go on the
 * retry; `Bearer` names a token endpoint (`realm`) that issues a token for the
 * `service` and `scope` of the request.
 */

/**
 * Wraps a secret so it never ends up in logs or JSON output.
 */
export class SecretString {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  expose(): string {
    return this.#value;
  }

  toString(): string {
    return "***";
  }

  toJSON(): string {
    return "***";
  }
}

export type Credentials = Readonly<{
  username: string;
  password: SecretString;
}>;

export type AuthChallenge =
  | Readonly<{ scheme: "basic"; realm?: string }>
  | Readonly<{ scheme: "bearer"; realm: string; service?: string; scope?: string }>;

const CHALLENGE_PARAM = /([A-Za-z_]+)="([^"]*)"/g;

/**
 * Parses a `WWW-Authenticate` header value. Returns null for schemes the client
 * does not speak, or for a Bearer challenge without a realm.
 */
export function parseChallenge(header: string): AuthChallenge | null {
  const trimmed = header.trim();
  const spaceIndex = trimmed.indexOf(" ");
  const scheme = (spaceIndex < 0 ? trimmed : trimmed.slice(0, spaceIndex)).toLowerCase();
  const params = new Map<string, string>();
  for (const match of trimmed.slice(spaceIndex + 1).matchAll(CHALLENGE_PARAM)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) params.set(key.toLowerCase(), value);
  }

  if (scheme === "basic") {
    const realm = params.get("realm");
    return realm === undefined ? { scheme: "basic" } : { scheme: "basic", realm };
  }

  if (scheme === "bearer") {
    const realm = params.get("realm");
    if (!realm) return null;
    const service = params.get("service");
    const scope = params.get("scope");
    return {
      scheme: "bearer",
      realm,
      ...(service === undefined ? {} : { service }),
      ...(scope === undefined ? {} : { scope }),
    };
  }

  return null;
}

export function basicAuthorization(credentials: Credentials): string {
  const raw = `${credentials.username}:${credentials.password.expose()}`;
  return `Basic ${Buffer.from(raw, "utf8").toString("base64")}`;
}

/** Builds the token endpoint URL for a Bearer challenge. */
export function tokenUrl(challenge: Extract<AuthChallenge, { scheme: "bearer" }>): URL {
  const url = new URL(challenge.realm);
  if (challenge.service) url.searchParams.set("service", challenge.service);
  if (challenge.scope) url.searchParams.set("scope", challenge.scope);
  return url;
}

type BearerToken = Readonly<{
  token: SecretString;
  expiresAt: number;
}>;

/** Registries that omit `expires_in` issue tokens valid for 60 seconds. */
const DEFAULT_TOKEN_LIFETIME_SEC = 60;
const EXPIRY_MARGIN_MS = 5_000;

/**
 * Bearer tokens keyed by challenge scope. Entries are dropped a few seconds
 * before they expire.
 */
export class TokenCache {
  private readonly tokens = new Map<string, BearerToken>();

  constructor(private readonly now: () => number = Date.now) {}

  get(scope: string): SecretString | undefined {
    const entry = this.tokens.get(scope);
    if (!entry) return undefined;
    if (entry.expiresAt - EXPIRY_MARGIN_MS <= this.now()) {
      this.tokens.delete(scope);
      return undefined;
    }
    return entry.token;
  }

  set(scope: string, token: SecretString, expiresInSec = DEFAULT_TOKEN_LIFETIME_SEC): void {
    this.tokens.set(scope, { token, expiresAt: this.now() + expiresInSec * 1000 });
  }

  get size(): number {
    return this.tokens.size;
  }
}
