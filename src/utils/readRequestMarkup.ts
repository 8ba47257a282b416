import { EmptyDocumentError } from "../errors/chunker/ChunkerErrorTypes";

// Accepts a raw text/html body or a JSON body of the form { html }
export function readRequestMarkup(body: unknown): string {
  if (typeof body === "string") {
    return body;
  }

  if (typeof body === "object" && body !== null && "html" in body && typeof body.html === "string") {
    return body.html;
  }

  throw new EmptyDocumentError("request body has no html");
}
