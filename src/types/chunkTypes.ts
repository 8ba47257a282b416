import { DigestNode } from "./contentTypes";

export interface ChunkDebugInfo {
  timestamp: string;
  inputLength: number;
  cheerioLoadSuccess?: boolean;
  chunkSuccess?: boolean;
  error?: string;
  contentStats?: {
    headingsCount?: number;
    nodesCount?: number;
  };
}

export interface BatchDocument {
  id: string;
  html: string;
}

export type BatchDocumentResult =
  | {
      id: string;
      success: true;
      nodes: DigestNode[];
    }
  | {
      id: string;
      success: false;
      error: {
        name: string;
        message: string;
      };
    };

export interface BatchResult {
  results: BatchDocumentResult[];
  successCount: number;
  failureCount: number;
}
