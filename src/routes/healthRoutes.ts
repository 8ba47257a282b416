// routes/healthRoutes.ts
import { Router } from "express";
import { healthService } from "../services/healthService";

const router = Router();

// GET /api/health - Get system health status
router.get("/", (_, res) => {
  try {
    const { status, statusCode } = healthService.getSystemHealth();
    res.status(statusCode).json(status);
  } catch (error) {
    console.error("Health check failed:", error);
    res.status(503).json({
      status: "unhealthy",
      timestamp: new Date().toISOString(),
      message: error instanceof Error ? error.message : "Health check failed",
    });
  }
});

export const healthRouter = router;
