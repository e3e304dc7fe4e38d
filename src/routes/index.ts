// routes/index.ts
import { Application } from "express";
import { extractRouter } from "./extractRoutes";
import { healthRouter } from "./healthRoutes";

export const setupRoutes = (app: Application) => {
  app.use("/api/extract", extractRouter);
  app.use("/api/health", healthRouter);
};
