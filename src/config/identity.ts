/**
 * Default author identity and server credentials.
 *
 * Consulted only when a container or a sync call leaves the corresponding
 * field empty. Values come from a "key = value" file (by default
 * ~/.scidata), overlaid by SCIDATA_* environment variables:
 *
 *   author = Jane Doe
 *   email  = jane@example.org
 *   server = https://data.example.org
 *   key    = 0123abcd
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse } from "dotenv";
import { optionalEnv } from "./env.js";

export interface IdentityDefaults {
  author?: string;
  email?: string;
  /** Base URL of the remote store */
  server?: string;
  /** API token for the remote store */
  key?: string;
}

const IDENTITY_KEYS = ["author", "email", "server", "key"] as const;

type IdentityKey = (typeof IDENTITY_KEYS)[number];

function isIdentityKey(key: string): key is IdentityKey {
  return IDENTITY_KEYS.some((known) => known === key);
}

/**
 * Parse the identity file. Lines follow dotenv syntax: "#" comments,
 * optional quotes around values. Keys are case-insensitive; unknown keys
 * and empty values are ignored.
 */
export function parseIdentityFile(text: string): IdentityDefaults {
  const result: IdentityDefaults = {};
  for (const [name, value] of Object.entries(parse(text))) {
    const key = name.toLowerCase();
    if (isIdentityKey(key) && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Identity file path: SCIDATA_CONFIG, else ~/.scidata.
 */
export function defaultIdentityFile(): string {
  return optionalEnv("SCIDATA_CONFIG", join(homedir(), ".scidata"));
}

export interface IdentitySources {
  /** Environment to read SCIDATA_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Identity file path (default: defaultIdentityFile()); missing files are skipped */
  file?: string;
}

/**
 * Load identity defaults from the file and the environment.
 */
export function loadIdentityDefaults(sources: IdentitySources = {}): IdentityDefaults {
  const env = sources.env ?? process.env;
  const file = sources.file ?? defaultIdentityFile();

  const result: IdentityDefaults = existsSync(file)
    ? parseIdentityFile(readFileSync(file, "utf-8"))
    : {};

  for (const key of IDENTITY_KEYS) {
    const value = env[`SCIDATA_${key.toUpperCase()}`];
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }

  return result;
}

let cachedDefaults: IdentityDefaults | null = null;

/**
 * Identity defaults for this process, loaded once.
 */
export function getIdentityDefaults(): IdentityDefaults {
  if (cachedDefaults === null) {
    cachedDefaults = loadIdentityDefaults();
  }
  return cachedDefaults;
}
