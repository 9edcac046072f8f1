/**
 * Container model: items, attributes, lifecycle, hashing and archives.
 */

export {
  Container,
  type ContainerOptions,
  type ItemsInput,
  type AcceptedTimestamps,
} from "./container.js";

export {
  ContainerError,
  SchemaViolationError,
  InvalidNameError,
  ImmutableContainerError,
  UnsupportedFormatError,
  NotFoundError,
  StaleWriteError,
  ImmutableRemoteError,
  NotOwnerError,
  AlreadyStaticError,
  CorruptArchiveError,
  RemoteError,
  isContainerError,
  describeError,
  type ContainerErrorCode,
  type AttributeIssue,
} from "./errors.js";

export {
  CONTENT_ITEM,
  META_ITEM,
  LICENSE_ITEM,
  RESERVED_ITEMS,
  parseItemName,
  sortItemNames,
  type ItemName,
} from "./names.js";

export {
  ContentSchema,
  MetaSchema,
  ContainerTypeSchema,
  SoftwareSchema,
  MODEL_VERSION,
  isModelVersionCompatible,
  type ContentAttributes,
  type MetaAttributes,
  type ContainerType,
  type Software,
} from "./schema.js";

export type { LifecycleState, LifecycleEvent } from "./lifecycle.js";
export { ARCHIVE_EXTENSION } from "./archive.js";
export { formatTimestamp, type Clock } from "./timestamp.js";
