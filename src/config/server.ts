// config/server.ts
import dotenv from "dotenv";
import { DEFAULT_MIN_ROOT_TEXT_LENGTH } from "../constants/chunkerConfig";

dotenv.config();

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const SERVER_CONFIG = {
  port: parseInteger(process.env.PORT, 3000),
  corsOrigins: (process.env.CORS_ORIGINS || "http://localhost:5000")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0),
  maxBodySize: process.env.MAX_BODY_SIZE || "10mb",
  maxBatchDocuments: parseInteger(process.env.MAX_BATCH_DOCUMENTS, 50),
  exposeErrorDetails: process.env.NODE_ENV === "development",
};

export const CHUNKER_CONFIG = {
  // Fallback root must carry more text than this to be picked
  minRootTextLength: parseInteger(process.env.MIN_ROOT_TEXT_LENGTH, DEFAULT_MIN_ROOT_TEXT_LENGTH),
};
