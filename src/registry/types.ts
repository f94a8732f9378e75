/**
 * Domain types for the registry browser's collaborator.
 *
 * The browser core only talks to {@link RegistryClient}; the HTTP implementation
 * in `client.ts` is one way to satisfy it.
 */

export type Platform = Readonly<{
  os: string;
  architecture: string;
  variant?: string;
}>;

export type Repository = Readonly<{
  /** Namespace the repository is grouped under. */
  namespace: string;
  /** Name without the namespace prefix. */
  repository: string;
  /** Full name as the registry knows it. */
  name: string;
}>;

export type Layer = Readonly<{
  digest: string;
  size: number;
  mediaType: string;
}>;

export type HistoryEntry = Readonly<{
  createdBy: string;
  emptyLayer: boolean;
  created?: string;
  comment?: string;
}>;

export type ImageConfig = Readonly<{
  digest: string;
  platform: Platform;
  history: readonly HistoryEntry[];
  /** Config blob as returned by the registry. */
  raw: unknown;
}>;

export type Image = Readonly<{
  repository: Repository;
  tag: string;
  digest: string;
  mediaType: string;
  /** Top-level manifest document (an index or a single image manifest). */
  manifest: unknown;
}>;

export type PlatformImage = Readonly<{
  repository: Repository;
  platformName: string;
  digest: string;
  layers: readonly Layer[];
  config: ImageConfig;
  /** Platform-specific image manifest document. */
  manifest: unknown;
}>;

export interface RegistryClient {
  listNamespaces(): Promise<readonly string[]>;
  listRepositories(namespace: string): Promise<ReadonlyMap<string, Repository>>;
  listTags(repository: Repository): Promise<readonly string[]>;
  getImage(repository: Repository, tag: string): Promise<Image>;
  getPlatformImages(image: Image): Promise<readonly PlatformImage[]>;
}
