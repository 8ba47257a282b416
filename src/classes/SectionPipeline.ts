import { CHUNKER_CONFIG } from "../config/server";
import { ChunkerError } from "../errors/chunker/ChunkerErrorTypes";
import { SectionExtractor } from "../extractors/SectionExtractor";
import { BatchDocument, BatchDocumentResult, BatchResult, ChunkDebugInfo } from "../types/chunkTypes";
import { ContentNode, DigestNode } from "../types/contentTypes";
import { collectHeadings } from "../utils/domTraversal";
import { loadContentIntoCheerio } from "../utils/loadContentIntoCheerio";
import { DigestFlattener } from "./DigestFlattener";

export interface PipelineOptions {
  minRootTextLength?: number;
  source?: string;
}

const UNKNOWN_ERROR_NAME = "UNKNOWN_ERROR";

const countNodes = (node: ContentNode): number =>
  1 + node.subsections.reduce((sum, child) => sum + countNodes(child), 0);

// SectionPipeline.ts
export class SectionPipeline {
  private readonly flattener = new DigestFlattener();

  chunkHtml(html: string, options: PipelineOptions = {}): ContentNode {
    const source = options.source ?? "document";
    const minRootTextLength = options.minRootTextLength ?? CHUNKER_CONFIG.minRootTextLength;
    const debugInfo: ChunkDebugInfo = {
      timestamp: new Date().toISOString(),
      inputLength: html.length,
    };

    const $ = loadContentIntoCheerio(html, debugInfo, source);

    try {
      const extractor = new SectionExtractor($, { minRootTextLength });
      const root = extractor.findRoot();
      const tree = extractor.chunk(root);

      debugInfo.chunkSuccess = true;
      debugInfo.contentStats = {
        headingsCount: collectHeadings(root).length,
        nodesCount: countNodes(tree),
      };
      console.log(
        `SectionPipeline: chunked ${source} (${debugInfo.contentStats.headingsCount} headings, ${debugInfo.contentStats.nodesCount} nodes)`
      );

      return tree;
    } catch (error) {
      debugInfo.chunkSuccess = false;
      debugInfo.error = error instanceof Error ? error.message : String(error);
      console.error(`SectionPipeline: chunking ${source} failed`, debugInfo);
      throw error;
    }
  }

  digestTree(tree: ContentNode): Generator<DigestNode> {
    return this.flattener.flatten(tree);
  }

  digestHtml(html: string, options: PipelineOptions = {}): Generator<DigestNode> {
    return this.digestTree(this.chunkHtml(html, options));
  }

  toJsonLines(nodes: Iterable<DigestNode>): Generator<string> {
    return this.flattener.toJsonLines(nodes);
  }

  /**
   * Runs every document through its own pipeline. A failing document is
   * reported in its own entry and the rest carry on.
   */
  static processBatch(documents: BatchDocument[], options: Omit<PipelineOptions, "source"> = {}): BatchResult {
    const results = documents.map((document): BatchDocumentResult => {
      const pipeline = new SectionPipeline();

      try {
        const nodes = Array.from(pipeline.digestHtml(document.html, { ...options, source: document.id }));
        return { id: document.id, success: true, nodes };
      } catch (error) {
        if (!(error instanceof ChunkerError)) {
          console.error(`SectionPipeline: unexpected failure on ${document.id}:`, error);
        }
        return {
          id: document.id,
          success: false,
          error:
            error instanceof Error
              ? { name: error.name, message: error.message }
              : { name: UNKNOWN_ERROR_NAME, message: String(error) },
        };
      }
    });

    const successCount = results.filter((result) => result.success).length;

    return {
      results,
      successCount,
      failureCount: results.length - successCount,
    };
  }
}
