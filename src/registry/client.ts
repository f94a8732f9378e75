import { createHash } from "node:crypto";
import type { z } from "zod";
import { RegistryError } from "../errors.js";
import { type Logger, createSilentLogger } from "../logger.js";
import {
  type AuthChallenge,
  type Credentials,
  SecretString,
  TokenCache,
  basicAuthorization,
  parseChallenge,
  tokenUrl,
} from "./auth.js";
import { formatPlatform, isUnknownPlatform } from "./platform.js";
import {
  MANIFEST_ACCEPT_HEADER,
  MEDIA_TYPES,
  type ImageManifest,
  catalogSchema,
  imageConfigSchema,
  imageIndexSchema,
  imageManifestSchema,
  tagListSchema,
  tokenResponseSchema,
} from "./schemas.js";
import type {
  HistoryEntry,
  Image,
  ImageConfig,
  PlatformImage,
  RegistryClient,
  Repository,
} from "./types.js";

/** Namespace for repositories whose name has no `/`. */
export const DEFAULT_NAMESPACE = "library";

const CATALOG_SCOPE = "registry:catalog:*";

export type HttpRegistryClientOptions = Readonly<{
  baseUrl: string;
  credentials?: Credentials;
  pageSize?: number;
  logger?: Logger;
  fetch?: typeof fetch;
  tokenCache?: TokenCache;
}>;

type ParsedBody<T> = Readonly<{ data: T; raw: unknown }>;

export function splitRepositoryName(name: string): Repository {
  const slash = name.indexOf("/");
  if (slash < 0) return { namespace: DEFAULT_NAMESPACE, repository: name, name };
  return { namespace: name.slice(0, slash), repository: name.slice(slash + 1), name };
}

/** Extracts the target of a `Link: <url>; rel="next"` header. */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/i.exec(part);
    if (match?.[1]) return match[1];
  }
  return null;
}

/**
 * {@link RegistryClient} over the Docker Registry HTTP API v2.
 *
 * Requests go out anonymously (or with a cached token) first; a `401` challenge
 * is answered once, with Basic credentials or a Bearer token from the
 * challenge's realm.
 */
export class HttpRegistryClient implements RegistryClient {
  private readonly baseUrl: URL;
  private readonly credentials: Credentials | undefined;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly tokens: TokenCache;
  private useBasic = false;
  private catalog: Promise<readonly string[]> | undefined;

  constructor(options: HttpRegistryClientOptions) {
    this.baseUrl = new URL(options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`);
    this.credentials = options.credentials;
    this.pageSize = options.pageSize ?? 1000;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "registry" });
    this.fetchImpl = options.fetch ?? fetch;
    this.tokens = options.tokenCache ?? new TokenCache();
  }

  /** Re-reads the catalog; later repository listings use this snapshot. */
  async listNamespaces(): Promise<readonly string[]> {
    const names = await this.refreshCatalog();
    const namespaces = new Set(names.map((name) => splitRepositoryName(name).namespace));
    return [...namespaces].sort();
  }

  async listRepositories(namespace: string): Promise<ReadonlyMap<string, Repository>> {
    const names = await (this.catalog ?? this.refreshCatalog());
    const repositories = new Map<string, Repository>();
    for (const name of names) {
      const repository = splitRepositoryName(name);
      if (repository.namespace === namespace) repositories.set(repository.repository, repository);
    }
    return repositories;
  }

  async listTags(repository: Repository): Promise<readonly string[]> {
    const scope = repositoryScope(repository);
    const tags: string[] = [];
    let url: URL | null = this.url(`v2/${repository.name}/tags/list`, { n: this.pageSize });
    while (url) {
      const response = await this.request(url, "application/json", scope);
      const { data } = await parseBody(response, tagListSchema, "tag list");
      tags.push(...(data.tags ?? []));
      url = this.nextPage(response);
    }
    return tags;
  }

  async getImage(repository: Repository, tag: string): Promise<Image> {
    const response = await this.request(
      this.url(`v2/${repository.name}/manifests/${tag}`),
      MANIFEST_ACCEPT_HEADER,
      repositoryScope(repository),
    );
    const text = await readText(response);
    const raw = parseJson(text, "manifest");
    const digest = response.headers.get("docker-content-digest") ?? sha256Digest(text);
    const mediaType = manifestMediaType(response, raw);
    return { repository, tag, digest, mediaType, manifest: raw };
  }

  async getPlatformImages(image: Image): Promise<readonly PlatformImage[]> {
    if (!isIndexMediaType(image.mediaType)) {
      const manifest = validate(imageManifestSchema, image.manifest, "image manifest");
      return [await this.loadPlatformImage(image.repository, image.digest, manifest, image.manifest)];
    }

    const index = validate(imageIndexSchema, image.manifest, "image index");
    const images: PlatformImage[] = [];
    for (const descriptor of index.manifests) {
      if (descriptor.platform && isUnknownPlatform(descriptor.platform)) continue;
      const response = await this.request(
        this.url(`v2/${image.repository.name}/manifests/${descriptor.digest}`),
        MANIFEST_ACCEPT_HEADER,
        repositoryScope(image.repository),
      );
      const { data, raw } = await parseBody(response, imageManifestSchema, "image manifest");
      images.push(await this.loadPlatformImage(image.repository, descriptor.digest, data, raw));
    }
    return images;
  }

  private async loadPlatformImage(
    repository: Repository,
    digest: string,
    manifest: ImageManifest,
    rawManifest: unknown,
  ): Promise<PlatformImage> {
    const config = await this.loadConfig(repository, manifest.config.digest);
    return {
      repository,
      platformName: formatPlatform(config.platform),
      digest,
      layers: manifest.layers.map((layer) => ({
        digest: layer.digest,
        size: layer.size,
        mediaType: layer.mediaType,
      })),
      config,
      manifest: rawManifest,
    };
  }

  private async loadConfig(repository: Repository, digest: string): Promise<ImageConfig> {
    const response = await this.request(
      this.url(`v2/${repository.name}/blobs/${digest}`),
      "application/json",
      repositoryScope(repository),
    );
    const { data, raw } = await parseBody(response, imageConfigSchema, "image config");
    const history: HistoryEntry[] = (data.history ?? []).map((entry) => ({
      createdBy: entry.created_by ?? "",
      emptyLayer: entry.empty_layer ?? false,
      ...(entry.created === undefined ? {} : { created: entry.created }),
      ...(entry.comment === undefined ? {} : { comment: entry.comment }),
    }));
    return {
      digest,
      platform: {
        os: data.os,
        architecture: data.architecture,
        ...(data.variant ? { variant: data.variant } : {}),
      },
      history,
      raw,
    };
  }

  private refreshCatalog(): Promise<readonly string[]> {
    const pending = this.fetchCatalog();
    this.catalog = pending;
    // A failed listing must not be served to later callers; they refetch.
    void pending.catch(() => {
      if (this.catalog === pending) this.catalog = undefined;
    });
    return pending;
  }

  private async fetchCatalog(): Promise<readonly string[]> {
    const names: string[] = [];
    let url: URL | null = this.url("v2/_catalog", { n: this.pageSize });
    while (url) {
      const response = await this.request(url, "application/json", CATALOG_SCOPE);
      const { data } = await parseBody(response, catalogSchema, "catalog");
      names.push(...(data.repositories ?? []));
      url = this.nextPage(response);
    }
    this.logger.debug({ repositories: names.length }, "catalog loaded");
    return names;
  }

  private url(path: string, query?: Readonly<Record<string, string | number>>): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  private nextPage(response: Response): URL | null {
    const next = parseNextLink(response.headers.get("link"));
    return next ? new URL(next, this.baseUrl) : null;
  }

  private async request(url: URL, accept: string, scope: string): Promise<Response> {
    const headers = new Headers({ Accept: accept });
    const authorization = this.cachedAuthorization(scope);
    if (authorization) headers.set("Authorization", authorization);

    let response = await this.send(url, headers);
    if (response.status === 401) {
      const challenge = parseChallenge(response.headers.get("www-authenticate") ?? "");
      if (challenge) {
        await discard(response);
        headers.set("Authorization", await this.answerChallenge(challenge, scope));
        response = await this.send(url, headers);
      }
    }

    if (!response.ok) {
      await discard(response);
      throw RegistryError.fromStatus(
        response.status,
        `GET ${url.pathname} failed with status ${String(response.status)}`,
      );
    }
    return response;
  }

  private cachedAuthorization(scope: string): string | undefined {
    if (this.useBasic && this.credentials) return basicAuthorization(this.credentials);
    const token = this.tokens.get(scope);
    return token ? `Bearer ${token.expose()}` : undefined;
  }

  private async answerChallenge(challenge: AuthChallenge, scope: string): Promise<string> {
    if (challenge.scheme === "basic") {
      if (!this.credentials) {
        throw new RegistryError("unauthorized", "registry requires credentials", {
          statusCode: 401,
        });
      }
      this.useBasic = true;
      return basicAuthorization(this.credentials);
    }

    const url = tokenUrl(challenge);
    const headers = new Headers({ Accept: "application/json" });
    if (this.credentials) headers.set("Authorization", basicAuthorization(this.credentials));
    const response = await this.send(url, headers);
    if (!response.ok) {
      await discard(response);
      throw RegistryError.fromStatus(
        response.status,
        `token request to ${url.host} failed with status ${String(response.status)}`,
      );
    }
    const { data } = await parseBody(response, tokenResponseSchema, "token response");
    const token = new SecretString(data.token ?? data.access_token ?? "");
    this.tokens.set(scope, token, data.expires_in);
    this.logger.debug({ scope, realm: url.host }, "bearer token issued");
    return `Bearer ${token.expose()}`;
  }

  private async send(url: URL, headers: Headers): Promise<Response> {
    try {
      const response = await this.fetchImpl(url, { headers });
      this.logger.debug({ path: url.pathname, status: response.status }, "registry request");
      return response;
    } catch (error) {
      throw new RegistryError("connection_failed", `request to ${url.host} failed`, {
        cause: error,
      });
    }
  }
}

function repositoryScope(repository: Repository): string {
  return `repository:${repository.name}:pull`;
}

function isIndexMediaType(mediaType: string): boolean {
  return mediaType === MEDIA_TYPES.OCI_INDEX || mediaType === MEDIA_TYPES.DOCKER_MANIFEST_LIST;
}

function manifestMediaType(response: Response, raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "mediaType" in raw) {
    const declared = raw.mediaType;
    if (typeof declared === "string") return declared;
  }
  const contentType = response.headers.get("content-type")?.split(";")[0]?.trim();
  if (contentType && contentType !== "application/json") return contentType;
  // OCI manifests may omit mediaType; an index is recognised by its manifests list.
  if (typeof raw === "object" && raw !== null && "manifests" in raw) return MEDIA_TYPES.OCI_INDEX;
  return MEDIA_TYPES.OCI_MANIFEST;
}

function sha256Digest(text: string): string {
  return `sha256:${createHash("sha256").update(text, "utf8").digest("hex")}`;
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new RegistryError("connection_failed", "response body could not be read", {
      statusCode: response.status,
      cause: error,
    });
  }
}

async function discard(response: Response): Promise<void> {
  await response.body?.cancel();
}

function parseJson(text: string, what: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new RegistryError("invalid_response", `${what} is not valid JSON`, { cause: error });
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new RegistryError(
      "invalid_response",
      `unexpected ${what}${where}: ${issue?.message ?? "schema mismatch"}`,
      { cause: result.error },
    );
  }
  return result.data;
}

async function parseBody<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  what: string,
): Promise<ParsedBody<z.output<S>>> {
  const raw = parseJson(await readText(response), what);
  return { data: validate(schema, raw, what), raw };
}
