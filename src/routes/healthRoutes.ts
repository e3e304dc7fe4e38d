// routes/healthRoutes.ts
import { Router } from "express";

const router = Router();

export interface HealthStatus {
  status: "healthy";
  timestamp: string;
  uptime: number;
}

// GET /api/health - Liveness of the extraction service
router.get("/", (_, res) => {
  const status: HealthStatus = {
    status: "healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  };
  res.json(status);
});

export const healthRouter = router;
