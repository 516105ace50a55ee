// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// script/build_graph.ts loads dotenv separately.
// Do NOT move dotenv loading into config.ts or services.
import dotenv from "dotenv";
dotenv.config();

import express, { type Request, Response, NextFunction } from "express";
import { createServer } from "http";
import { ConsoleAuditSink } from "../platform/audit";
import { DataNotFound } from "../platform/errors";
import { loadEngineConfig } from "./config";
import { createEngineContext } from "./engineContext";
import { loadGraphStore } from "./graph/graphService";
import { registerRoutes } from "./routes";

const app = express();
const httpServer = createServer(app);

app.use(express.json());

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined && res.statusCode >= 400) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      log(logLine);
    }
  });

  next();
});

(async () => {
  const config = loadEngineConfig();

  const graph = await loadGraphStore(config).catch((e: unknown) => {
    if (e instanceof DataNotFound) {
      console.error(`${e.message}. Run "npm run graph:build" first.`);
      process.exit(1);
    }
    throw e;
  });

  const ctx = createEngineContext(graph, config, { audit: new ConsoleAuditSink() });
  await registerRoutes(httpServer, app, ctx);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const message = err instanceof Error ? err.message : "Internal Server Error";

    console.error("Internal Server Error:", err);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(500).json({ message });
  });

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
})().catch((err) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
