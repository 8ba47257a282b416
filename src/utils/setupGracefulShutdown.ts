import { Server } from "http";

export function setupGracefulShutdown(server: Server) {
  function shutdown(signal: NodeJS.Signals) {
    console.log(`Received ${signal}, shutting down gracefully...`);

    // Stop accepting new requests and let in-flight ones finish
    server.close((error) => {
      if (error) {
        console.error("Error during graceful shutdown:", error);
        process.exit(1);
      }
      console.log("HTTP server closed");
      process.exit(0);
    });
  }

  // Handle different termination signals
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}
