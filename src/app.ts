import express, { Express } from "express";
import cors from "cors";
import { API_CONFIG } from "./config";
import { AppContext } from "./context";
import { createRouter } from "./api/routes";
import errorHandler, { notFoundHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";

export function createApp(context: AppContext): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Routes
  app.get("/", (req, res) => {
    res.json({
      message: "Ticketing records",
      currentVersion: API_CONFIG.current,
      availableVersions: API_CONFIG.supported,
      documentation: {
        v1: "/api/v1",
      },
    });
  });

  app.use(`/api/${API_CONFIG.current}`, createRouter(context));

  // Redirect /api to current version
  app.use("/api", (req, res, next) => {
    if (req.path.startsWith(`/${API_CONFIG.current}`)) {
      return next();
    }
    res.redirect(`/api/${API_CONFIG.current}${req.path === "/" ? "" : req.path}`);
  });

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}
