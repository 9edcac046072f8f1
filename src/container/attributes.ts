/**
 * Attribute validation and defaulting.
 *
 * Runs once when a container is built, loaded from an archive or fetched
 * from a store, and again on every attribute edit. Only absent fields are
 * filled; modelVersion is the one field that is always stamped.
 */

import { randomUUID } from "node:crypto";
import type { IdentityDefaults } from "../config/identity.js";
import { SchemaViolationError, toAttributeIssues, type AttributeIssue } from "./errors.js";
import {
  ContentSchema,
  MetaSchema,
  MODEL_VERSION,
  type ContentAttributes,
  type MetaAttributes,
} from "./schema.js";

export interface DefaultingContext {
  /** Current timestamp, already formatted */
  now: string;
  /** Identity lookup for meta.author and meta.email */
  defaults: IdentityDefaults;
  /** Identifier generator (default: random version-4 UUID) */
  newId?: () => string;
}

export interface Attributes {
  content: ContentAttributes;
  meta: MetaAttributes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function withDefault(
  record: Record<string, unknown>,
  key: string,
  fallback: () => unknown
): void {
  if (record[key] === undefined) {
    const value = fallback();
    if (value !== undefined) {
      record[key] = value;
    }
  }
}

/**
 * Validate both attribute records, filling absent automatic fields.
 *
 * @throws SchemaViolationError listing every issue in either record
 */
export function validateAndDefault(
  content: unknown,
  meta: unknown,
  context: DefaultingContext
): Attributes {
  const issues: AttributeIssue[] = [];
  if (!isRecord(content)) {
    issues.push({ path: ["content"], message: "must be an object", code: "invalid_type" });
  }
  if (!isRecord(meta)) {
    issues.push({ path: ["meta"], message: "must be an object", code: "invalid_type" });
  }
  if (!isRecord(content) || !isRecord(meta)) {
    throw new SchemaViolationError("Invalid container attributes", issues);
  }

  const newId = context.newId ?? randomUUID;

  const filledContent: Record<string, unknown> = { ...content };
  withDefault(filledContent, "uuid", newId);
  withDefault(filledContent, "created", () => context.now);
  withDefault(filledContent, "modified", () => filledContent.created);
  withDefault(filledContent, "static", () => false);
  withDefault(filledContent, "complete", () => true);
  withDefault(filledContent, "usedSoftware", () => []);
  filledContent.modelVersion = MODEL_VERSION;

  const filledMeta: Record<string, unknown> = { ...meta };
  withDefault(filledMeta, "author", () => context.defaults.author);
  withDefault(filledMeta, "email", () => context.defaults.email);

  const contentResult = ContentSchema.safeParse(filledContent);
  const metaResult = MetaSchema.safeParse(filledMeta);

  if (!contentResult.success) {
    issues.push(...toAttributeIssues("content", contentResult.error.issues));
  }
  if (!metaResult.success) {
    issues.push(...toAttributeIssues("meta", metaResult.error.issues));
  }
  if (!contentResult.success || !metaResult.success) {
    throw new SchemaViolationError(
      `Invalid container attributes: ${issues.length} validation error(s)`,
      issues
    );
  }

  return { content: contentResult.data, meta: metaResult.data };
}
