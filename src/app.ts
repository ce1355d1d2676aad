import express from "express";
import cors from "cors";
import { errorHandler } from "./middleware/error.js";
import { registerRoutes, type RoutesConfig } from "./routes/index.js";

export type AppConfig = RoutesConfig & {
  trustedOrigins?: string[];
};

export function createApp(config: AppConfig): express.Express {
  const app = express();

  if (config.trustedOrigins && config.trustedOrigins.length > 0) {
    app.use(
      cors({
        origin: config.trustedOrigins,
        methods: ["GET", "POST", "OPTIONS"],
        allowedHeaders: ["Content-Type", "Authorization"],
      })
    );
  }

  app.use(express.json());

  registerRoutes(app, config);

  app.use(errorHandler);
  return app;
}
