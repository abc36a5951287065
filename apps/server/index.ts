import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { registerRoutes } from "./routes";
import {
  loadAircraftCatalog,
  loadPlannerConfig,
  loadUldCatalog,
} from "../../packages/utils/src";

const app = express();

const config = loadPlannerConfig();

app.use(cors({
  origin: true,
}));

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

function log(message: string, source = "server") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }
      log(logLine);
    }
  });

  next();
});

(async () => {
  const [aircraftDb, uldDb] = await Promise.all([
    loadAircraftCatalog(config.aircraftDbPath),
    loadUldCatalog(config.uldDbPath),
  ]);
  const catalogWarnings = [...aircraftDb.warnings, ...uldDb.warnings];
  for (const warning of catalogWarnings) {
    log(warning, "catalog");
  }

  const server = await registerRoutes(app, {
    aircraftCatalog: aircraftDb.catalog,
    uldCatalog: uldDb.catalog,
    config,
    catalogWarnings,
  });

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    const message = err.message || "Internal Server Error";

    res.status(status).json({ message });
    log(`${status} ${message}`);
  });

  server.listen(config.port, "0.0.0.0", () => {
    log(`Load planner API running on port ${config.port}`);
    log(`Aircraft catalog: ${aircraftDb.catalog.size} models, ULD types: ${uldDb.catalog.length}`);
  });
})().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exitCode = 1;
});
