import { z } from "zod";

/**
 * Wire schemas for the Docker Registry HTTP API v2 and the OCI image spec.
 * Only the fields the browser reads are declared; everything else is ignored.
 */

export const MEDIA_TYPES = {
  DOCKER_MANIFEST: "application/vnd.docker.distribution.manifest.v2+json",
  DOCKER_MANIFEST_LIST: "application/vnd.docker.distribution.manifest.list.v2+json",
  OCI_MANIFEST: "application/vnd.oci.image.manifest.v1+json",
  OCI_INDEX: "application/vnd.oci.image.index.v1+json",
} as const;

export const MANIFEST_ACCEPT_HEADER = [
  MEDIA_TYPES.OCI_INDEX,
  MEDIA_TYPES.DOCKER_MANIFEST_LIST,
  MEDIA_TYPES.OCI_MANIFEST,
  MEDIA_TYPES.DOCKER_MANIFEST,
].join(", ");

export const catalogSchema = z.object({
  repositories: z.array(z.string()).nullish(),
});

export const tagListSchema = z.object({
  name: z.string(),
  tags: z.array(z.string()).nullish(),
});

const descriptorSchema = z.object({
  mediaType: z.string(),
  digest: z.string(),
  size: z.number().int().nonnegative(),
});

const platformSchema = z.object({
  os: z.string(),
  architecture: z.string(),
  variant: z.string().optional(),
});

export const imageIndexSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  manifests: z.array(descriptorSchema.extend({ platform: platformSchema.optional() })),
});

export const imageManifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  config: descriptorSchema,
  layers: z.array(descriptorSchema),
});

export const imageConfigSchema = z.object({
  os: z.string(),
  architecture: z.string(),
  variant: z.string().optional(),
  history: z
    .array(
      z.object({
        created: z.string().optional(),
        created_by: z.string().optional(),
        empty_layer: z.boolean().optional(),
        comment: z.string().optional(),
      }),
    )
    .optional(),
});

export const tokenResponseSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
    expires_in: z.number().positive().optional(),
  })
  .refine((body) => body.token !== undefined || body.access_token !== undefined, {
    message: "token response carries neither token nor access_token",
  });

export type ImageManifest = z.infer<typeof imageManifestSchema>;

