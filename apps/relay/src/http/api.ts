/**
 * HTTP API.
 *
 * Endpoints:
 * - GET /api/status - Controller status, normalised, plus the relay timestamp
 * - POST /api/admin - { action: "get_sequences" | "start_sequence" | "stop_playback" }
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import {
  validateAdminRequest,
  type AdminResponse,
  type PlaybackStatus,
  type RelayStatus,
} from "@lumasync/shared";
import { StatusSourceError, describeError } from "@lumasync/sync";
import { CommandDispatchError } from "../fpp/commandClient.js";

/** Max admin request body: 16KB */
const MAX_BODY_BYTES = 16 * 1024;

export interface ApiDeps {
  status: {
    fetchStatus(signal?: AbortSignal): Promise<PlaybackStatus>;
  };
  commands: {
    startPlaylist(name: string): Promise<void>;
    stopNow(): Promise<void>;
    listSequences(): Promise<string[]>;
    listPlaylists(): Promise<string[]>;
  };
  now?: () => number;
}

export interface ApiResult<T> {
  statusCode: number;
  body: T;
}

export class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}

// ============================================================================
// Route handlers
// ============================================================================

/** GET /api/status */
export async function getRelayStatus(
  deps: ApiDeps
): Promise<ApiResult<RelayStatus | { error: string }>> {
  try {
    const status = await deps.status.fetchStatus();
    const serverTs = (deps.now ?? Date.now)();
    return { statusCode: 200, body: { ...status, serverTs } };
  } catch (error) {
    if (error instanceof StatusSourceError) {
      console.warn(`[status] ${error.code}: ${error.message}`);
      return { statusCode: 502, body: { error: error.message } };
    }
    throw error;
  }
}

/** POST /api/admin */
export async function handleAdminRequest(
  body: unknown,
  deps: ApiDeps
): Promise<ApiResult<AdminResponse>> {
  const parsed = validateAdminRequest(body);
  if (!parsed.success) {
    return { statusCode: 400, body: { success: false, error: parsed.error } };
  }

  const request = parsed.data;
  try {
    switch (request.action) {
      case "get_sequences": {
        const [sequences, playlists] = await Promise.all([
          deps.commands.listSequences(),
          deps.commands.listPlaylists(),
        ]);
        return { statusCode: 200, body: { success: true, sequences, playlists } };
      }
      case "start_sequence":
        await deps.commands.startPlaylist(request.sequence);
        return { statusCode: 200, body: { success: true } };
      case "stop_playback":
        await deps.commands.stopNow();
        return { statusCode: 200, body: { success: true } };
    }
  } catch (error) {
    if (error instanceof CommandDispatchError) {
      console.warn(`[admin] ${error.message}`);
      return { statusCode: 502, body: { success: false, error: "Controller command failed" } };
    }
    throw error;
  }
}

// ============================================================================
// Node glue
// ============================================================================

function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json", "Cache-Control": "no-store" });
  res.end(JSON.stringify(data));
}

/** Read a JSON body from a request */
export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestBodyError("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString();
      if (text.trim() === "") {
        resolve({});
        return;
      }
      try {
        const value: unknown = JSON.parse(text);
        resolve(value);
      } catch {
        reject(new RequestBodyError("Invalid JSON body"));
      }
    });
    req.on("error", reject);
  });
}

/**
 * Route an HTTP request to the API.
 * Returns false when the path is not an API route.
 */
export async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  deps: ApiDeps
): Promise<boolean> {
  const path = (req.url ?? "/").split("?")[0];

  if (path === "/api/status" && req.method === "GET") {
    try {
      const result = await getRelayStatus(deps);
      sendJson(res, result.statusCode, result.body);
    } catch (error) {
      console.error("[status] unexpected error:", error);
      sendJson(res, 500, { error: describeError(error) });
    }
    return true;
  }

  if (path === "/api/admin" && req.method === "POST") {
    try {
      const body = await readJsonBody(req);
      const result = await handleAdminRequest(body, deps);
      sendJson(res, result.statusCode, result.body);
    } catch (error) {
      if (error instanceof RequestBodyError) {
        sendJson(res, 400, { success: false, error: error.message });
      } else {
        console.error("[admin] unexpected error:", error);
        sendJson(res, 500, { success: false, error: "Internal server error" });
      }
    }
    return true;
  }

  return false;
}
