/**
 * Status source that polls the relay's /api/status.
 */

import { validateRelayStatus, type PlaybackStatus } from "@lumasync/shared";
import { StatusSourceError, describeError, type StatusSource } from "@lumasync/sync";

export class HttpStatusSource implements StatusSource {
  private readonly url: string;

  constructor(relayUrl: string) {
    this.url = `${relayUrl.replace(/\/+$/, "")}/api/status`;
  }

  async fetchStatus(signal: AbortSignal): Promise<PlaybackStatus> {
    let response: Response;
    try {
      response = await fetch(this.url, { method: "GET", cache: "no-store", signal });
    } catch (error) {
      throw new StatusSourceError("UNREACHABLE", `Relay unreachable: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new StatusSourceError("BAD_RESPONSE", `Relay answered HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new StatusSourceError("BAD_RESPONSE", `Relay sent invalid JSON: ${describeError(error)}`);
    }

    const result = validateRelayStatus(body);
    if (!result.success) {
      throw new StatusSourceError("BAD_RESPONSE", `Unexpected status payload: ${result.error}`);
    }

    const { isPlaying, currentItemId, elapsedSeconds } = result.data;
    return { isPlaying, currentItemId, elapsedSeconds };
  }
}
