import express from "express";
import { createRouter, RouteDependencies } from "./routes";
import { createTextGenerator } from "../narrative/textGenerator";
import { AppConfig, loadConfig } from "../utils/config";

/**
 * Route dependencies as configured by the environment.
 */
export function dependenciesFromConfig(config: AppConfig): RouteDependencies {
  return {
    generator: createTextGenerator(config.ai),
    thresholds: config.thresholds,
  };
}

/**
 * Builds the Express app. Dependencies default to what the environment configures.
 */
export function createApp(deps: RouteDependencies = dependenciesFromConfig(loadConfig())): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(deps));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Budget and Goal Planning API",
      version: "1.0.0",
      endpoints: {
        analyze: "POST /api/budget/analyze",
        plan: "POST /api/goals/plan",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware (malformed JSON bodies land here)
  app.use(
    (err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: "Malformed JSON body", message: err.message });
        return;
      }
      console.error("Unhandled error:", err);
      res.status(500).json({
        error: "Internal server error",
        message: err instanceof Error ? err.message : String(err),
      });
    }
  );

  return app;
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const deps = dependenciesFromConfig(config);
  createApp(deps).listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
    console.log(`Narrative provider: ${deps.generator ? deps.generator.name : "template"}`);
  });
}
