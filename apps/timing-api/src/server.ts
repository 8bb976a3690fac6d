import fs from "fs";
import path from "path";
import http from "http";
import { config as loadEnv } from "dotenv";
import { createApp } from "./app";
import { loadApiConfig } from "./config/env";

const envCandidates = [
  path.resolve(__dirname, "..", ".env.local"),
  path.resolve(__dirname, "..", ".env"),
  path.resolve(__dirname, "..", "..", "..", ".env.local"),
  path.resolve(__dirname, "..", "..", "..", ".env"),
];

envCandidates.forEach((p) => {
  if (fs.existsSync(p)) {
    loadEnv({ path: p });
  }
});

const config = loadApiConfig();
const portCandidates = config.allowPortFallback
  ? Array.from({ length: 10 }, (_, idx) => config.port + idx)
  : [config.port];

const server = http.createServer(createApp(config));

const listenWithFallback = (index = 0) => {
  const port = portCandidates[index];
  server.removeAllListeners("error");
  server.removeAllListeners("listening");

  server.once("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE" && index + 1 < portCandidates.length) {
      console.warn(`[timing-api] port ${port} in use, trying ${portCandidates[index + 1]}`);
      listenWithFallback(index + 1);
      return;
    }
    console.error(`[timing-api] fatal: ${error.message}`);
    process.exit(1);
  });

  server.once("listening", () => {
    console.log(`[timing-api] listening on http://localhost:${port}`);
  });
  server.listen(port);
};

const shutdown = (signal: string) => {
  console.log(`[timing-api] received ${signal}, shutting down`);
  server.close(() => process.exit(0));
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

listenWithFallback();
