import { MenuNode } from "../menu/node.js";
import { MENU_LEVELS, type Menu, type MenuLevel, type MenuRow, levelIndex } from "../menu/types.js";
import { splitRepositoryName } from "../registry/client.js";
import { formatPlatform } from "../registry/platform.js";
import type {
  HistoryEntry,
  Image,
  Layer,
  Platform,
  PlatformImage,
  RegistryClient,
  Repository,
} from "../registry/types.js";

export const LINUX_AMD64: Platform = { os: "linux", architecture: "amd64" };
export const LINUX_ARM64: Platform = { os: "linux", architecture: "arm64", variant: "v8" };

export function digestOf(seed: string): string {
  return `sha256:${seed.padEnd(64, "0")}`;
}

export function layer(seed: string, size: number): Layer {
  return {
    digest: digestOf(seed),
    size,
    mediaType: "application/vnd.oci.image.layer.v1.tar+gzip",
  };
}

export function step(createdBy: string, emptyLayer = false): HistoryEntry {
  return { createdBy, emptyLayer };
}

export function platformImage(
  options: Readonly<{
    repository?: Repository;
    platform?: Platform;
    seed?: string;
    history?: readonly HistoryEntry[];
    layers?: readonly Layer[];
  }> = {},
): PlatformImage {
  const platform = options.platform ?? LINUX_AMD64;
  const history = options.history ?? [step("/bin/sh -c #(nop) ADD file:abc in /"), step("CMD", true)];
  const layers = options.layers ?? [layer("aa", 2048)];
  return {
    repository: options.repository ?? splitRepositoryName("team/api"),
    platformName: formatPlatform(platform),
    digest: digestOf(options.seed ?? "ab"),
    layers,
    config: {
      digest: digestOf("cf"),
      platform,
      history,
      raw: {
        os: platform.os,
        architecture: platform.architecture,
        history: history.map((entry) => ({
          created_by: entry.createdBy,
          ...(entry.emptyLayer ? { empty_layer: true } : {}),
        })),
      },
    },
    manifest: { schemaVersion: 2, layers: layers.map((item) => item.digest) },
  };
}

type FakeData = Readonly<{
  /** Full repository name to its tags. */
  tags: Readonly<Record<string, readonly string[]>>;
  /** `name:tag` to the platform images behind it. */
  images?: Readonly<Record<string, readonly PlatformImage[]>>;
}>;

/**
 * In-memory registry. Counts every call so tests can tell cached menus from
 * rebuilt ones; `failNext` makes the next call of a method reject.
 */
export class FakeRegistryClient implements RegistryClient {
  readonly calls: string[] = [];
  private readonly failures = new Map<string, Error>();

  constructor(private readonly data: FakeData) {}

  failNext(method: keyof RegistryClient, error: Error): void {
    this.failures.set(method, error);
  }

  count(call: string): number {
    return this.calls.filter((entry) => entry === call).length;
  }

  async listNamespaces(): Promise<readonly string[]> {
    this.record("listNamespaces");
    const namespaces = Object.keys(this.data.tags).map((name) => splitRepositoryName(name).namespace);
    return [...new Set(namespaces)].sort();
  }

  async listRepositories(namespace: string): Promise<ReadonlyMap<string, Repository>> {
    this.record("listRepositories", namespace);
    const repositories = new Map<string, Repository>();
    for (const name of Object.keys(this.data.tags).sort()) {
      const repository = splitRepositoryName(name);
      if (repository.namespace === namespace) repositories.set(repository.repository, repository);
    }
    return repositories;
  }

  async listTags(repository: Repository): Promise<readonly string[]> {
    this.record("listTags", repository.name);
    return this.data.tags[repository.name] ?? [];
  }

  async getImage(repository: Repository, tag: string): Promise<Image> {
    this.record("getImage", `${repository.name}:${tag}`);
    return {
      repository,
      tag,
      digest: digestOf("1d"),
      mediaType: "application/vnd.oci.image.index.v1+json",
      manifest: { schemaVersion: 2, tag },
    };
  }

  async getPlatformImages(image: Image): Promise<readonly PlatformImage[]> {
    this.record("getPlatformImages", `${image.repository.name}:${image.tag}`);
    return this.data.images?.[`${image.repository.name}:${image.tag}`] ?? [];
  }

  private record(method: keyof RegistryClient, argument?: string): void {
    this.calls.push(argument === undefined ? method : `${method} ${argument}`);
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }
}

/** Menu of `count` node rows (or leaf rows for the layers level). */
export function menuOf(level: MenuLevel, heading: string, count: number): Menu {
  const items = Array.from({ length: count }, (_, index): MenuRow => {
    const key = `${heading}-${String(index)}`;
    if (level === "layers") {
      return {
        kind: "leaf",
        key,
        cells: [{ text: key }],
        detail: { text: `RUN step ${String(index)}`, document: { step: index } },
      };
    }
    const target = MENU_LEVELS[levelIndex(level) + 1] ?? "layers";
    return {
      kind: "node",
      key,
      cells: [{ text: key }],
      target,
      node: new MenuNode(key, key, async () => menuOf(target, key, 1)),
    };
  });
  return { level, heading, items, document: { heading } };
}
