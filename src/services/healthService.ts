// services/healthService.ts
import { SectionPipeline } from "../classes/SectionPipeline";
import { checkChunkerHealth, HealthStatus } from "../utils/checkHealth";

export class HealthService {
  constructor(private pipeline: SectionPipeline = new SectionPipeline()) {}

  getSystemHealth(): { status: HealthStatus; statusCode: number } {
    const status: HealthStatus = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      services: {
        api: {
          status: "healthy",
          uptime: process.uptime(),
        },
        chunker: checkChunkerHealth(this.pipeline),
      },
    };

    if (status.services.chunker.status === "unhealthy") {
      status.status = "unhealthy";
    }

    const statusCode = status.status === "unhealthy" ? 503 : 200;
    return { status, statusCode };
  }
}

export const healthService = new HealthService();
