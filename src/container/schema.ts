/**
 * Attribute record schemas for the two reserved items.
 *
 * content.json describes the container itself: identity, type, lifecycle
 * flags and provenance. meta.json describes the dataset for humans: who
 * made it, what it is, how it may be used.
 *
 * VERSIONING:
 * modelVersion is stamped on every validation. Archives are accepted when
 * their major version matches MODEL_VERSION.
 */

import { z } from "zod";
import { TIMESTAMP_PATTERN } from "./timestamp.js";

/** Current attribute model version */
export const MODEL_VERSION = "1.0.0";

const Timestamp = z.string().regex(TIMESTAMP_PATTERN, "must be a UTC timestamp like 2024-01-31T12:00:00Z");

const Uuid = z.string().uuid();

export const HASH_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Container type: what kind of dataset this is.
 */
export const ContainerTypeSchema = z
  .object({
    /** Type name, e.g. "camera-frame" */
    name: z.string().min(1).regex(/^\S+$/, "must not contain whitespace"),

    /** Optional registry identifier of the type definition */
    id: z.string().min(1).optional(),

    /** Version of the type definition; required with id */
    version: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.id !== undefined && value.version === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["version"],
        message: "version is required when id is set",
      });
    }
  });

export type ContainerType = z.infer<typeof ContainerTypeSchema>;

/**
 * Software used to produce the dataset.
 */
export const SoftwareSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    /** Identifier such as a DOI or a repository URL */
    id: z.string().min(1).optional(),
    /** Kind of identifier; required with id */
    idType: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.id !== undefined && value.idType === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["idType"],
        message: "idType is required when id is set",
      });
    }
  });

export type Software = z.infer<typeof SoftwareSchema>;

/**
 * content.json record.
 */
export const ContentSchema = z
  .object({
    uuid: Uuid,

    /** Predecessor this container supersedes */
    replaces: Uuid.optional(),

    containerType: ContainerTypeSchema,

    created: Timestamp,

    modified: Timestamp,

    /** Frozen by content hash; no further changes */
    static: z.boolean(),

    /** False allows the remote copy to be replaced (multi-step) */
    complete: z.boolean(),

    /** SHA-256 content hash; required for static containers */
    hash: z.string().regex(HASH_PATTERN, "must be a lowercase SHA-256 hex digest").optional(),

    usedSoftware: z.array(SoftwareSchema),

    modelVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.static && value.hash === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["hash"],
        message: "hash is required for static containers",
      });
    }
  });

export type ContentAttributes = z.infer<typeof ContentSchema>;

/**
 * meta.json record.
 */
export const MetaSchema = z
  .object({
    author: z.string().min(1),
    email: z.string().min(1),
    organization: z.string().optional(),
    comment: z.string().optional(),
    title: z.string().min(1),
    keywords: z.array(z.string()).optional(),
    description: z.string().optional(),
    /** When the underlying data was produced, free form */
    created: z.string().optional(),
    doi: z.string().optional(),
    license: z.string().optional(),
  })
  .strict();

export type MetaAttributes = z.infer<typeof MetaSchema>;

/**
 * Check if an attribute model version is compatible with the current one.
 * Only the major version has to match.
 */
export function isModelVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = MODEL_VERSION.split(".").map(Number);
  return major === currentMajor;
}
