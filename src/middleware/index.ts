// middleware/index.ts
import { Application } from "express";
import express from "express";
import cors from "cors";
import { SERVER_CONFIG } from "../config/server";

export const setupMiddleware = (app: Application) => {
  // CORS configuration
  const corsOptions = {
    origin: SERVER_CONFIG.corsOrigins,
    methods: ["GET", "POST"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  };

  // Apply middlewares
  app.use(cors(corsOptions));
  app.use(express.json({ limit: SERVER_CONFIG.maxBodySize }));
  app.use(express.urlencoded({ extended: true, limit: SERVER_CONFIG.maxBodySize }));
  app.use(
    express.text({
      type: ["text/html", "text/plain", "application/x-ndjson"],
      limit: SERVER_CONFIG.maxBodySize,
    })
  );

  // Add security headers
  app.use((req, res, next) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("X-XSS-Protection", "1; mode=block");
    next();
  });

  // Request logging middleware
  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });
};

// Registered after the routes so it sees their errors
export const setupErrorHandling = (app: Application) => {
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    // body-parser rejections (malformed JSON, oversized bodies) carry their own status
    if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: "Bad Request", message: err.message });
      return;
    }

    console.error(err.stack);
    res.status(500).json({
      error: "Internal Server Error",
      message: SERVER_CONFIG.exposeErrorDetails ? err.message : "Something went wrong",
    });
  });
};
