export class ChunkerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CHUNKER_ERROR";
  }
}

export class EmptyDocumentError extends ChunkerError {
  constructor(source: string) {
    super(`EMPTY_DOCUMENT: ${source}`);
    this.name = "EMPTY_DOCUMENT_ERROR";
  }
}

export class MarkupParseError extends ChunkerError {
  constructor(reason: string) {
    super(`MARKUP_PARSE_FAILED: ${reason}`);
    this.name = "MARKUP_PARSE_ERROR";
  }
}

export class InvalidContentNodeError extends ChunkerError {
  constructor(reason: string) {
    super(`INVALID_CONTENT_NODE: ${reason}`);
    this.name = "INVALID_CONTENT_NODE_ERROR";
  }
}

export class InvalidDigestStreamError extends ChunkerError {
  constructor(reason: string) {
    super(`INVALID_DIGEST_STREAM: ${reason}`);
    this.name = "INVALID_DIGEST_STREAM_ERROR";
  }
}

export class DigestSerializationError extends ChunkerError {
  constructor(title: string) {
    super(`DIGEST_SERIALIZATION_FAILED: ${title}`);
    this.name = "DIGEST_SERIALIZATION_ERROR";
  }
}
