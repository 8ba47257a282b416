import express from "express";
import { createServer } from "http";
import { SERVER_CONFIG } from "./config/server";
import { setupErrorHandling, setupMiddleware } from "./middleware";
import { setupRoutes } from "./routes";
import { setupGracefulShutdown } from "./utils/setupGracefulShutdown";

export const app = express();

setupMiddleware(app);
setupRoutes(app);
setupErrorHandling(app);

export { SectionPipeline } from "./classes/SectionPipeline";
export { DigestFlattener } from "./classes/DigestFlattener";
export { SectionExtractor } from "./extractors/SectionExtractor";
export { shortenText } from "./utils/shortenText";
export { generateSectionDigest } from "./utils/generateSectionDigest";
export { computeDigestHash } from "./utils/computeDigestHash";
export { rebuildContentTree } from "./utils/rebuildContentTree";
export * from "./types/contentTypes";
export * from "./errors/chunker/ChunkerErrorTypes";

if (require.main === module) {
  const server = createServer(app);
  setupGracefulShutdown(server);

  server.listen(SERVER_CONFIG.port, () => {
    console.log(`Server running on port ${SERVER_CONFIG.port}`);
  });
}
