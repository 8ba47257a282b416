import { SectionPipeline } from "../classes/SectionPipeline";

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  services: {
    api: {
      status: "healthy" | "unhealthy";
      uptime: number;
    };
    chunker: {
      status: "healthy" | "unhealthy";
      nodes?: number;
      message?: string;
    };
  };
}

const PROBE_DOCUMENT = "<h1>Probe</h1><p>Intro</p><h2>Part</h2><p>Body</p>";

// Runs a two-section probe through the whole pipeline
export function checkChunkerHealth(pipeline: SectionPipeline): HealthStatus["services"]["chunker"] {
  try {
    const nodes = Array.from(pipeline.digestHtml(PROBE_DOCUMENT, { source: "health-probe" }));
    const [root, child] = nodes;

    if (nodes.length !== 2 || root.title !== "Probe" || child.parent_digest_hash !== root.digest_hash) {
      return {
        status: "unhealthy",
        nodes: nodes.length,
        message: "Probe document produced an unexpected structure",
      };
    }

    return { status: "healthy", nodes: nodes.length };
  } catch (error) {
    return {
      status: "unhealthy",
      message: error instanceof Error ? error.message : "Chunker probe failed",
    };
  }
}
