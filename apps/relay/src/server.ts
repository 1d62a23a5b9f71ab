import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";

// Load environment variables from .env.local
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = resolve(__dirname, "../.env.local");
dotenv.config({ path: envPath });

import { createServer } from "http";
import { mkdir } from "fs/promises";
import { Server } from "socket.io";
import { VERSION } from "@lumasync/shared";
import { PlaybackDriver } from "@lumasync/sync";
import { loadConfig } from "./config.js";
import { FppStatusClient } from "./fpp/statusClient.js";
import { FppCommandClient } from "./fpp/commandClient.js";
import { handleApiRequest, type ApiDeps } from "./http/api.js";
import { FrameStreamHub } from "./stream/hub.js";
import { registerStreamHandlers } from "./handlers/stream.js";

const config = loadConfig(process.env);

console.log(`[relay] CORS origins: ${config.corsOrigins.join(", ")}`);
console.log(`[relay] controller: ${config.fppBaseUrl}`);

const statusClient = new FppStatusClient({
  baseUrl: config.fppBaseUrl,
  timeoutMs: config.statusTimeoutMs,
});

const commandClient = new FppCommandClient({
  baseUrl: config.fppBaseUrl,
  commandTimeoutMs: config.commandTimeoutMs,
  listTimeoutMs: config.listTimeoutMs,
});

const apiDeps: ApiDeps = { status: statusClient, commands: commandClient };

const driver = new PlaybackDriver({
  source: statusClient,
  config: {
    pollIntervalMs: config.statusPollMs,
    pollTimeoutMs: config.statusTimeoutMs,
    estimator: config.estimator,
  },
});

const hub = new FrameStreamHub({
  driver,
  audioDir: config.audioDir,
  defaultChannels: config.defaultChannels,
  defaultFps: config.frameRate,
});

const httpServer = createServer(async (req, res) => {
  // Add CORS headers for all HTTP requests
  const origin = req.headers.origin;
  if (origin && config.corsOrigins.includes(origin)) {
    res.setHeader("Access-Control-Allow-Origin", origin);
  } else {
    res.setHeader("Access-Control-Allow-Origin", config.corsOrigins[0] ?? "*");
  }
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");

  // Handle preflight OPTIONS requests
  if (req.method === "OPTIONS") {
    res.writeHead(204);
    res.end();
    return;
  }

  // Health check endpoint
  if (req.url === "/health") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(
      JSON.stringify({
        status: "ok",
        version: VERSION,
        driver: driver.getState(),
        streams: hub.getActiveSessions().length,
      })
    );
    return;
  }

  const handled = await handleApiRequest(req, res, apiDeps);
  if (handled) {
    return;
  }

  res.writeHead(404);
  res.end();
});

const io = new Server(httpServer, {
  cors: {
    origin: config.corsOrigins,
    methods: ["GET", "POST"],
  },
  pingInterval: 10000,
  pingTimeout: 5000,
});

io.on("connection", (socket) => {
  console.log(`[connect] socket=${socket.id}`);
  registerStreamHandlers(socket, hub);
});

driver.subscribe((event) => {
  if (event.type === "HARD_SEEK" || event.type === "LOST_SYNC" || event.type === "ITEM_STARTED") {
    console.log(`[relay] ${event.type}`, event);
  }
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[relay] ${signal} received, shutting down`);
  await hub.cleanupAll();
  io.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[relay] shutdown failed:", error);
      process.exit(1);
    });
  });
}

// Ensure the companion directory exists, then start the server
(async () => {
  await mkdir(config.audioDir, { recursive: true });

  httpServer.listen(config.port, () => {
    console.log(`[relay] server listening on port ${config.port}`);
    console.log(`[relay] shared package version: ${VERSION}`);
    console.log(`[relay] companion files: ${config.audioDir}`);
  });
})().catch((error: unknown) => {
  console.error("[relay] startup failed:", error);
  process.exit(1);
});
