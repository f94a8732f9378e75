import { cleanCreatedBy, formatSize, trimDigest } from "../helpers/format.js";
import {
  historyLabel,
  layerSizeLabel,
  rawHistoryEntry,
  resolveLayer,
  totalLayerSize,
} from "../helpers/layers.js";
import { samePlatform } from "../registry/platform.js";
import type { Platform, PlatformImage, RegistryClient, Repository } from "../registry/types.js";
import { MenuNode } from "./node.js";
import type { LeafRow, Menu, NodeRow } from "./types.js";

export type MenuContext = Readonly<{
  client: RegistryClient;
  preferredPlatform?: Platform | undefined;
}>;

export type TagKey = Readonly<{
  repository: Repository;
  tag: string;
}>;

/** Node whose menu lists the registry's namespaces. */
export function createRootNode(context: MenuContext, registryUrl: string): MenuNode<string> {
  return new MenuNode(registryUrl, registryUrl, () => buildNamespaceMenu(context, registryUrl));
}

export async function buildNamespaceMenu(context: MenuContext, registryUrl: string): Promise<Menu> {
  const namespaces = await context.client.listNamespaces();
  return {
    level: "namespaces",
    heading: registryUrl,
    items: namespaces.map(
      (namespace): NodeRow => ({
        kind: "node",
        key: namespace,
        cells: [{ text: namespace }],
        target: "repositories",
        node: new MenuNode(namespace, namespace, (key) => buildRepositoryMenu(context, key)),
      }),
    ),
    document: { registry: registryUrl, namespaces },
  };
}

export async function buildRepositoryMenu(context: MenuContext, namespace: string): Promise<Menu> {
  const repositories = await context.client.listRepositories(namespace);
  return {
    level: "repositories",
    heading: namespace,
    items: [...repositories.values()].map(
      (repository): NodeRow => ({
        kind: "node",
        key: repository.name,
        cells: [{ text: repository.repository }],
        target: "tags",
        node: new MenuNode(repository, repository.name, (key) => buildTagMenu(context, key)),
      }),
    ),
    document: { namespace, repositories: [...repositories.keys()] },
  };
}

export async function buildTagMenu(context: MenuContext, repository: Repository): Promise<Menu> {
  const tags = await context.client.listTags(repository);
  return {
    level: "tags",
    heading: repository.name,
    items: tags.map(
      (tag): NodeRow => ({
        kind: "node",
        key: tag,
        cells: [{ text: tag }],
        target: "platforms",
        node: new MenuNode<TagKey>({ repository, tag }, tag, (key) =>
          buildPlatformMenu(context, key),
        ),
      }),
    ),
    document: { name: repository.name, tags },
  };
}

/** Moves images for the preferred platform to the front, keeping relative order. */
export function orderPlatformImages(
  images: readonly PlatformImage[],
  preferred: Platform | undefined,
): readonly PlatformImage[] {
  if (!preferred) return images;
  const matching = images.filter((image) => samePlatform(image.config.platform, preferred));
  const others = images.filter((image) => !samePlatform(image.config.platform, preferred));
  return [...matching, ...others];
}

export async function buildPlatformMenu(context: MenuContext, key: TagKey): Promise<Menu> {
  const image = await context.client.getImage(key.repository, key.tag);
  const platformImages = orderPlatformImages(
    await context.client.getPlatformImages(image),
    context.preferredPlatform,
  );

  return {
    level: "platforms",
    heading: `${key.repository.name} - ${key.tag}`,
    items: platformImages.map(
      (platformImage): NodeRow => ({
        kind: "node",
        key: platformImage.digest,
        cells: [
          { text: platformImage.platformName },
          { text: trimDigest(platformImage.digest) },
          { text: formatSize(totalLayerSize(platformImage)), align: "right" },
        ],
        target: "layers",
        node: new MenuNode(platformImage, platformImage.platformName, async (pimage) =>
          buildLayerMenu(pimage),
        ),
      }),
    ),
    document: image.manifest,
  };
}

/** One leaf row per build step; sizes come from the matching layer. */
export function buildLayerMenu(image: PlatformImage): Menu {
  return {
    level: "layers",
    heading: image.platformName,
    items: image.config.history.map(
      (entry, index): LeafRow => ({
        kind: "leaf",
        key: String(index),
        cells: [
          { text: historyLabel(entry.createdBy) },
          { text: layerSizeLabel(image, index), align: "right" },
        ],
        detail: {
          text: cleanCreatedBy(entry.createdBy),
          document: { history: rawHistoryEntry(image, index), layer: resolveLayer(image, index) },
        },
      }),
    ),
    document: { manifest: image.manifest, config: image.config.raw },
  };
}
