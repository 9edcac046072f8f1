/**
 * Attribute Validation Tests
 *
 * Run with: npm test
 *
 * Tests verification of:
 *   1. Defaulting of automatic fields
 *   2. Identity defaults for meta.json
 *   3. Cross-field rules
 *   4. Issue paths
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { validateAndDefault, type DefaultingContext } from "./attributes.js";
import { SchemaViolationError } from "./errors.js";
import { MODEL_VERSION, isModelVersionCompatible } from "./schema.js";

const NOW = "2024-05-01T10:00:00Z";
const ID = "11111111-1111-4111-8111-111111111111";

const context: DefaultingContext = {
  now: NOW,
  defaults: { author: "Test Author", email: "author@example.org" },
  newId: () => ID,
};

const minimalContent = { containerType: { name: "dice-roll" } };
const minimalMeta = { title: "Dice" };

function issuePaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaViolationError) {
      return err.issues.map((issue) => issue.path.join("."));
    }
    throw err;
  }
  assert.fail("expected SchemaViolationError");
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTING
// ═══════════════════════════════════════════════════════════════════════════

test("automatic content fields are filled", () => {
  const { content } = validateAndDefault(minimalContent, minimalMeta, context);
  assert.deepEqual(content, {
    uuid: ID,
    containerType: { name: "dice-roll" },
    created: NOW,
    modified: NOW,
    static: false,
    complete: true,
    usedSoftware: [],
    modelVersion: MODEL_VERSION,
  });
});

test("given fields are kept and modified defaults to created", () => {
  const { content } = validateAndDefault(
    { ...minimalContent, created: "2023-01-01T00:00:00Z", complete: false },
    minimalMeta,
    context
  );
  assert.equal(content.created, "2023-01-01T00:00:00Z");
  assert.equal(content.modified, "2023-01-01T00:00:00Z");
  assert.equal(content.complete, false);
});

test("modelVersion is always restamped", () => {
  const { content } = validateAndDefault(
    { ...minimalContent, modelVersion: "1.0.0-old" },
    minimalMeta,
    context
  );
  assert.equal(content.modelVersion, MODEL_VERSION);
});

test("author and email come from identity defaults only when absent", () => {
  const filled = validateAndDefault(minimalContent, minimalMeta, context).meta;
  assert.equal(filled.author, "Test Author");
  assert.equal(filled.email, "author@example.org");

  const given = validateAndDefault(
    minimalContent,
    { ...minimalMeta, author: "Other" },
    context
  ).meta;
  assert.equal(given.author, "Other");
});

test("missing author without defaults is a violation", () => {
  const paths = issuePaths(() =>
    validateAndDefault(minimalContent, minimalMeta, { now: NOW, defaults: {} })
  );
  assert.deepEqual(paths, ["meta.author", "meta.email"]);
});

test("validating a validated record changes nothing", () => {
  const once = validateAndDefault(minimalContent, minimalMeta, context);
  const twice = validateAndDefault(once.content, once.meta, {
    now: "2030-01-01T00:00:00Z",
    defaults: {},
    newId: () => "22222222-2222-4222-8222-222222222222",
  });
  assert.deepEqual(twice, once);
});

test("inputs are not mutated", () => {
  const content = { containerType: { name: "x" } };
  validateAndDefault(content, minimalMeta, context);
  assert.deepEqual(content, { containerType: { name: "x" } });
});

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

test("containerType is required", () => {
  assert.deepEqual(
    issuePaths(() => validateAndDefault({}, minimalMeta, context)),
    ["content.containerType"]
  );
});

test("type name must not contain whitespace", () => {
  assert.deepEqual(
    issuePaths(() =>
      validateAndDefault({ containerType: { name: "two words" } }, minimalMeta, context)
    ),
    ["content.containerType.name"]
  );
});

test("type id requires a version", () => {
  assert.deepEqual(
    issuePaths(() =>
      validateAndDefault({ containerType: { name: "t", id: "reg:1" } }, minimalMeta, context)
    ),
    ["content.containerType.version"]
  );
});

test("software id requires an idType", () => {
  assert.deepEqual(
    issuePaths(() =>
      validateAndDefault(
        { ...minimalContent, usedSoftware: [{ name: "sim", version: "2", id: "doi:x" }] },
        minimalMeta,
        context
      )
    ),
    ["content.usedSoftware.0.idType"]
  );
});

test("static requires a hash", () => {
  assert.deepEqual(
    issuePaths(() => validateAndDefault({ ...minimalContent, static: true }, minimalMeta, context)),
    ["content.hash"]
  );
});

test("unknown fields are rejected in both records", () => {
  const paths = issuePaths(() =>
    validateAndDefault({ ...minimalContent, colour: "red" }, { ...minimalMeta, size: 1 }, context)
  );
  assert.deepEqual(paths, ["content", "meta"]);
});

test("non-object records are rejected", () => {
  assert.deepEqual(
    issuePaths(() => validateAndDefault([], "meta", context)),
    ["content", "meta"]
  );
});

test("model versions are compatible within a major version", () => {
  assert.equal(isModelVersionCompatible("1.9.3"), true);
  assert.equal(isModelVersionCompatible("2.0.0"), false);
  assert.equal(isModelVersionCompatible("0.1.0"), false);
});
