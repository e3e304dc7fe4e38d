// middleware/index.ts
import { Application } from "express";
import express from "express";
import cors from "cors";
import { EXTRACTOR_CONFIG } from "../config/extractorConfig";

export const setupMiddleware = (app: Application) => {
  // CORS configuration
  const corsOptions = {
    origin: EXTRACTOR_CONFIG.corsOrigins,
    methods: ["GET", "POST"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  };

  // Apply middlewares
  app.use(cors(corsOptions));
  app.use(express.json());

  // Add security headers
  app.use((req, res, next) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    next();
  });

  // Request logging middleware
  app.use((req, res, next) => {
    if (process.env.NODE_ENV !== "test") {
      console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    }
    next();
  });
};

// Must be registered after the routes
export const setupErrorHandling = (app: Application) => {
  app.use(
    (err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error(err.stack);
      res.status(500).json({
        error: "Internal Server Error",
        message: process.env.NODE_ENV === "development" ? err.message : "Something went wrong",
      });
    }
  );
};
