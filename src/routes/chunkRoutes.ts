// routes/chunkRoutes.ts
import { Router } from "express";
import { SectionPipeline } from "../classes/SectionPipeline";
import { SERVER_CONFIG } from "../config/server";
import { respondWithError } from "../utils/respondWithError";
import { readRequestMarkup } from "../utils/readRequestMarkup";
import { streamJsonLines } from "../utils/streamJsonLines";
import { BatchRequestSchema } from "../utils/validateContentNode";

const router = Router();

// POST /api/chunk - Chunk one document into a section tree
router.post("/", (req, res) => {
  try {
    const html = readRequestMarkup(req.body);
    const tree = new SectionPipeline().chunkHtml(html, { source: "request" });
    res.json(tree);
  } catch (error) {
    respondWithError(res, error, "chunk document");
  }
});

// POST /api/chunk/digest - Chunk one document and stream its digest nodes
router.post("/digest", (req, res) => {
  try {
    const html = readRequestMarkup(req.body);
    const pipeline = new SectionPipeline();
    streamJsonLines(res, pipeline.toJsonLines(pipeline.digestHtml(html, { source: "request" })));
  } catch (error) {
    respondWithError(res, error, "digest document");
  }
});

// POST /api/chunk/batch - Digest several independent documents
router.post("/batch", (req, res) => {
  const parsed = BatchRequestSchema.safeParse(req.body);

  if (!parsed.success) {
    res.status(400).json({
      error: "Invalid batch request",
      message: parsed.error.issues.map((issue) => issue.message).join("; "),
    });
    return;
  }

  const { documents } = parsed.data;
  if (documents.length > SERVER_CONFIG.maxBatchDocuments) {
    res.status(400).json({
      error: "Batch too large",
      message: `At most ${SERVER_CONFIG.maxBatchDocuments} documents per request`,
    });
    return;
  }

  try {
    res.json(SectionPipeline.processBatch(documents));
  } catch (error) {
    respondWithError(res, error, "process batch");
  }
});

export const chunkRouter = router;
