/**
 * Status client for the show controller.
 *
 * GET {base}/api/fppd/status, normalised to a PlaybackStatus. Used both as
 * the shared driver's status source and behind the relay's /api/status.
 */

import { validateControllerStatus, type PlaybackStatus } from "@lumasync/shared";
import { StatusSourceError, describeError, type StatusSource } from "@lumasync/sync";
import { fetchWithTimeout, readJson } from "./http.js";

export interface StatusClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class FppStatusClient implements StatusSource {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: StatusClientOptions) {
    this.url = `${options.baseUrl}/api/fppd/status`;
    this.timeoutMs = options.timeoutMs;
  }

  async fetchStatus(signal?: AbortSignal): Promise<PlaybackStatus> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.url, { method: "GET" }, this.timeoutMs, signal);
    } catch (error) {
      throw new StatusSourceError("UNREACHABLE", `Controller unreachable: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new StatusSourceError("BAD_RESPONSE", `Controller answered HTTP ${response.status}`);
    }

    const body = await readJson(response);
    const result = validateControllerStatus(body);
    if (!result.success) {
      throw new StatusSourceError("BAD_RESPONSE", `Unexpected status payload: ${result.error}`);
    }
    return result.data;
  }
}
