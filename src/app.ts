import express from "express";
import { setupErrorHandling, setupMiddleware } from "./middleware";
import { setupRoutes } from "./routes";

export const createApp = () => {
  const app = express();

  setupMiddleware(app);
  setupRoutes(app);
  setupErrorHandling(app);

  return app;
};
