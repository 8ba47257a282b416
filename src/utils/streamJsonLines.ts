import { Response } from "express";

/**
 * Writes lines to the response as they are produced. Once the first line is
 * out, a failure can only cut the stream short; the caller sees it logged.
 */
export function streamJsonLines(res: Response, lines: Iterable<string>) {
  const iterator = lines[Symbol.iterator]();
  // The first line is pulled before any header goes out
  let next = iterator.next();

  res.status(200).type("application/x-ndjson");

  try {
    while (!next.done) {
      res.write(next.value);
      next = iterator.next();
    }
  } catch (error) {
    console.error("streamJsonLines: stream aborted:", error);
  }

  res.end();
}
