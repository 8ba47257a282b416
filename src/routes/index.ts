// routes/index.ts
import { Application } from "express";
import { chunkRouter } from "./chunkRoutes";
import { digestRouter } from "./digestRoutes";
import { healthRouter } from "./healthRoutes";

export const setupRoutes = (app: Application) => {
  app.use("/api/chunk", chunkRouter);
  app.use("/api/digest", digestRouter);
  app.use("/api/health", healthRouter);
};
