import { Response } from "express";
import { SERVER_CONFIG } from "../config/server";
import { ChunkerError } from "../errors/chunker/ChunkerErrorTypes";

export function respondWithError(res: Response, error: unknown, action: string) {
  if (error instanceof ChunkerError) {
    res.status(400).json({ error: error.name, message: error.message });
    return;
  }

  console.error(`Failed to ${action}:`, error);
  res.status(500).json({
    error: `Failed to ${action}`,
    details:
      SERVER_CONFIG.exposeErrorDetails && error instanceof Error ? error.message : "Unknown error",
  });
}
