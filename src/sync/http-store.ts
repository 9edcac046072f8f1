/**
 * REST client for a dataset server.
 *
 * Endpoints (relative to the server URL):
 *
 *   POST /api/datasets/                       create, 201 + state
 *   PUT  /api/datasets/{uuid}/                replace, 200 + state
 *   GET  /api/datasets/{uuid}/                state, 404 if unknown
 *   GET  /api/datasets/{uuid}/download/       archive, or 3xx to successor
 *   GET  /api/datasets/?static=true&name=&hash=   archive, 404 if none
 *
 * Requests carry `Authorization: Token <credential>`.
 */

import { fetch, type Dispatcher, type Response } from "undici";
import {
  ImmutableRemoteError,
  NotFoundError,
  NotOwnerError,
  RemoteError,
  SchemaViolationError,
  StaleWriteError,
  describeError,
} from "../container/errors.js";
import { RemoteStateSchema, type FetchResult, type RemoteState, type RemoteStore } from "./types.js";

export interface HttpRemoteStoreOptions {
  /** Base URL of the server */
  server: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** undici dispatcher (connection pool, proxy, mock agent) */
  dispatcher?: Dispatcher;
}

const UUID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi;

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpRemoteStore implements RemoteStore {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: HttpRemoteStoreOptions) {
    this.baseUrl = options.server.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async create(archive: Uint8Array, credential: string): Promise<RemoteState> {
    const response = await this.request("POST", "/api/datasets/", credential, archive);
    if (response.status !== 201 && response.status !== 200) {
      throw await this.toError(response, "create");
    }
    return this.parseState(response);
  }

  async replace(uuid: string, archive: Uint8Array, credential: string): Promise<RemoteState> {
    const response = await this.request("PUT", `/api/datasets/${uuid}/`, credential, archive);
    if (response.status !== 200) {
      throw await this.toError(response, `replace ${uuid}`, uuid);
    }
    return this.parseState(response);
  }

  async get(uuid: string, credential: string): Promise<FetchResult> {
    const response = await this.request("GET", `/api/datasets/${uuid}/download/`, credential);

    if (response.status >= 300 && response.status < 400) {
      await response.body?.cancel();
      const location = response.headers.get("location") ?? "";
      const successor = location.match(UUID_PATTERN)?.pop();
      if (successor === undefined) {
        throw new RemoteError(`Redirect for ${uuid} has no successor: "${location}"`, response.status);
      }
      return { kind: "redirect", uuid: successor.toLowerCase() };
    }
    if (response.status !== 200) {
      throw await this.toError(response, `download ${uuid}`);
    }
    return { kind: "archive", bytes: new Uint8Array(await response.arrayBuffer()) };
  }

  async findStatic(name: string, hash: string, credential: string): Promise<Uint8Array | null> {
    const query = new URLSearchParams({ static: "true", name, hash });
    const response = await this.request("GET", `/api/datasets/?${query.toString()}`, credential);
    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }
    if (response.status !== 200) {
      throw await this.toError(response, `look up static ${name}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  async stat(uuid: string, credential: string): Promise<RemoteState | null> {
    const response = await this.request("GET", `/api/datasets/${uuid}/`, credential);
    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }
    if (response.status !== 200) {
      throw await this.toError(response, `stat ${uuid}`);
    }
    return this.parseState(response);
  }

  // ============================================================
  // Internals
  // ============================================================

  private async request(
    method: "GET" | "POST" | "PUT",
    path: string,
    credential: string,
    body?: Uint8Array
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Token ${credential}`,
      Accept: "application/json, application/zip",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/zip";
    }

    return fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      redirect: "manual",
      signal: AbortSignal.timeout(this.timeoutMs),
      dispatcher: this.dispatcher,
    });
  }

  private async parseState(response: Response): Promise<RemoteState> {
    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new RemoteError(`Invalid JSON from server: ${describeError(err)}`, response.status);
    }

    const result = RemoteStateSchema.safeParse(json);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new RemoteError(`Unexpected server response: ${detail}`, response.status);
    }
    return result.data;
  }

  private async toError(response: Response, action: string, uuid?: string): Promise<Error> {
    const text = (await response.text()).trim();
    const message = text ? `Failed to ${action}: ${text}` : `Failed to ${action}`;

    switch (response.status) {
      case 400:
        return new SchemaViolationError(message);
      case 403:
        return new NotOwnerError(message);
      case 404:
        return new NotFoundError(message);
      case 409:
        return new StaleWriteError(message);
      case 423:
        return new ImmutableRemoteError(uuid ?? "unknown");
      default:
        return new RemoteError(`${message} (HTTP ${response.status})`, response.status);
    }
  }
}
