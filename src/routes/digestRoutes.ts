// routes/digestRoutes.ts
import { Router } from "express";
import { DigestFlattener } from "../classes/DigestFlattener";
import { InvalidDigestStreamError } from "../errors/chunker/ChunkerErrorTypes";
import { rebuildContentTree } from "../utils/rebuildContentTree";
import { respondWithError } from "../utils/respondWithError";
import { streamJsonLines } from "../utils/streamJsonLines";
import { parseDigestLines, validateContentNode } from "../utils/validateContentNode";

const router = Router();

// POST /api/digest - Flatten a section tree into JSON Lines
router.post("/", (req, res) => {
  try {
    const tree = validateContentNode(req.body);
    const flattener = new DigestFlattener();
    streamJsonLines(res, flattener.toJsonLines(flattener.flatten(tree)));
  } catch (error) {
    respondWithError(res, error, "flatten section tree");
  }
});

// POST /api/digest/rebuild - Reassemble JSON Lines into a section tree
router.post("/rebuild", (req, res) => {
  try {
    if (typeof req.body !== "string") {
      throw new InvalidDigestStreamError("expected a JSON Lines text body");
    }
    res.json(rebuildContentTree(parseDigestLines(req.body)));
  } catch (error) {
    respondWithError(res, error, "rebuild section tree");
  }
});

export const digestRouter = router;
