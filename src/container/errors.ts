/**
 * Error taxonomy for containers, codecs and remote synchronization.
 *
 * Every failure the library reports is a ContainerError with a stable
 * `code`, so callers can branch on the code without instanceof chains
 * across package boundaries.
 */

import type { ZodIssue } from "zod";

export type ContainerErrorCode =
  | "SchemaViolation"
  | "InvalidName"
  | "ImmutableContainer"
  | "UnsupportedFormat"
  | "NotFound"
  | "StaleWrite"
  | "ImmutableRemote"
  | "NotOwner"
  | "AlreadyStatic"
  | "CorruptArchive"
  | "Remote";

export class ContainerError extends Error {
  public readonly code: ContainerErrorCode;

  constructor(code: ContainerErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "ContainerError";
  }
}

/**
 * Individual attribute validation issue.
 */
export interface AttributeIssue {
  /** Path to the invalid field, starting with the record name */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "custom" */
  code: string;
}

/**
 * Convert Zod issues to our structured format, prefixed with the record name.
 */
export function toAttributeIssues(record: string, zodIssues: ZodIssue[]): AttributeIssue[] {
  return zodIssues.map((issue) => ({
    path: [
      record,
      ...issue.path.filter(
        (p): p is string | number => typeof p === "string" || typeof p === "number"
      ),
    ],
    message: issue.message,
    code: issue.code,
  }));
}

export class SchemaViolationError extends ContainerError {
  public readonly issues: AttributeIssue[];

  constructor(message: string, issues: AttributeIssue[] = []) {
    super("SchemaViolation", message);
    this.name = "SchemaViolationError";
    this.issues = issues;
  }

  /**
   * Format issues for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path.join(".")}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export class InvalidNameError extends ContainerError {
  constructor(public readonly itemName: string, reason: string) {
    super("InvalidName", `Invalid item name "${itemName}": ${reason}`);
    this.name = "InvalidNameError";
  }
}

export class ImmutableContainerError extends ContainerError {
  constructor(action: string) {
    super("ImmutableContainer", `Cannot ${action}: container is immutable`);
    this.name = "ImmutableContainerError";
  }
}

export class UnsupportedFormatError extends ContainerError {
  constructor(message: string) {
    super("UnsupportedFormat", message);
    this.name = "UnsupportedFormatError";
  }
}

export class NotFoundError extends ContainerError {
  constructor(message: string) {
    super("NotFound", message);
    this.name = "NotFoundError";
  }
}

export class StaleWriteError extends ContainerError {
  constructor(message: string) {
    super("StaleWrite", message);
    this.name = "StaleWriteError";
  }
}

export class ImmutableRemoteError extends ContainerError {
  constructor(uuid: string) {
    super("ImmutableRemote", `Remote container ${uuid} is complete and cannot be changed`);
    this.name = "ImmutableRemoteError";
  }
}

export class NotOwnerError extends ContainerError {
  constructor(message: string) {
    super("NotOwner", message);
    this.name = "NotOwnerError";
  }
}

export class AlreadyStaticError extends ContainerError {
  constructor(uuid: string) {
    super("AlreadyStatic", `Container ${uuid} is already static`);
    this.name = "AlreadyStaticError";
  }
}

export class CorruptArchiveError extends ContainerError {
  constructor(message: string) {
    super("CorruptArchive", message);
    this.name = "CorruptArchiveError";
  }
}

/**
 * The remote store answered with something the protocol does not define.
 * Transport failures (DNS, refused connections, timeouts) are not wrapped.
 */
export class RemoteError extends ContainerError {
  constructor(message: string, public readonly status?: number) {
    super("Remote", message);
    this.name = "RemoteError";
  }
}

/**
 * Whether a thrown value is one of this library's errors.
 */
export function isContainerError(err: unknown): err is ContainerError {
  return err instanceof ContainerError;
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
