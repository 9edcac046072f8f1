/**
 * Identity Defaults Tests
 *
 * Run with: npm test
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadIdentityDefaults, parseIdentityFile } from "./identity.js";

test("parses key = value lines, skipping comments and unknown keys", () => {
  const text = [
    "# identity",
    "",
    "Author = Test Author",
    "email=author@example.org",
    "server = https://data.test",
    "colour = blue",
    "key =",
  ].join("\n");

  assert.deepEqual(parseIdentityFile(text), {
    author: "Test Author",
    email: "author@example.org",
    server: "https://data.test",
  });
});

test("values may contain '='", () => {
  assert.deepEqual(parseIdentityFile("key = test=secret"), { key: "test=secret" });
});

test("quotes and trailing comments are stripped from values", () => {
  const text = 'email = "author@example.org"\nserver = https://data.test # shared store\n';
  assert.deepEqual(parseIdentityFile(text), {
    email: "author@example.org",
    server: "https://data.test",
  });
});

test("environment overrides the file", () => {
  const dir = mkdtempSync(join(tmpdir(), "scidata-identity-"));
  try {
    const file = join(dir, "identity");
    writeFileSync(file, "author = From File\nemail = file@example.org\n");

    const defaults = loadIdentityDefaults({
      file,
      env: { SCIDATA_AUTHOR: "From Env", SCIDATA_KEY: "test-secret", SCIDATA_EMAIL: "" },
    });
    assert.deepEqual(defaults, {
      author: "From Env",
      email: "file@example.org",
      key: "test-secret",
    });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("missing file yields environment values only", () => {
  const defaults = loadIdentityDefaults({
    file: join(tmpdir(), "scidata-no-such-identity"),
    env: { SCIDATA_SERVER: "https://data.test" },
  });
  assert.deepEqual(defaults, { server: "https://data.test" });
});
