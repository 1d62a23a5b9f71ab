/**
 * Command dispatch and listings for the show controller.
 *
 * Commands are fire-and-forget: the controller answers success or failure,
 * never a position. Listings degrade to an empty list.
 */

import {
  COMMAND_NAMES,
  validatePlaylistList,
  validateSequenceList,
  type CommandRequest,
  type ValidationResult,
} from "@lumasync/shared";
import { describeError } from "@lumasync/sync";
import { fetchWithTimeout, readJson } from "./http.js";

export class CommandDispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandDispatchError";
  }
}

export interface CommandClientOptions {
  baseUrl: string;
  commandTimeoutMs: number;
  listTimeoutMs: number;
}

export class FppCommandClient {
  private readonly baseUrl: string;
  private readonly commandTimeoutMs: number;
  private readonly listTimeoutMs: number;

  constructor(options: CommandClientOptions) {
    this.baseUrl = options.baseUrl;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.listTimeoutMs = options.listTimeoutMs;
  }

  /** POST a command; rejects with CommandDispatchError on any failure */
  async sendCommand(request: CommandRequest): Promise<void> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        `${this.baseUrl}/api/command`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(request),
        },
        this.commandTimeoutMs
      );
    } catch (error) {
      throw new CommandDispatchError(`${request.command} failed: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new CommandDispatchError(`${request.command} failed: HTTP ${response.status}`);
    }
  }

  /** Start a playlist or a sequence file */
  startPlaylist(name: string): Promise<void> {
    console.log(`[command] start item=${name}`);
    return this.sendCommand({ command: COMMAND_NAMES.START_PLAYLIST, args: [name] });
  }

  stopNow(): Promise<void> {
    console.log("[command] stop");
    return this.sendCommand({ command: COMMAND_NAMES.STOP_NOW });
  }

  /** Sequence file names, with the extension the start command needs */
  listSequences(): Promise<string[]> {
    return this.fetchList("/api/sequence", validateSequenceList);
  }

  listPlaylists(): Promise<string[]> {
    return this.fetchList("/api/playlists", validatePlaylistList);
  }

  private async fetchList(
    path: string,
    validate: (raw: unknown) => ValidationResult<string[]>
  ): Promise<string[]> {
    try {
      const response = await fetchWithTimeout(
        `${this.baseUrl}${path}`,
        { method: "GET" },
        this.listTimeoutMs
      );
      if (!response.ok) {
        console.warn(`[command] ${path} answered HTTP ${response.status}`);
        return [];
      }
      const result = validate(await readJson(response));
      if (!result.success) {
        console.warn(`[command] ${path} unexpected payload: ${result.error}`);
        return [];
      }
      return result.data;
    } catch (error) {
      console.warn(`[command] ${path} failed:`, error);
      return [];
    }
  }
}
