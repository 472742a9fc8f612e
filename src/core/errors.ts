/** Non-2xx response after the transport gave up retrying. */
export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
  ) {
    super(`HTTP ${status} while fetching ${url}`);
    this.name = "HttpStatusError";
  }
}

/** Expected a PDF, got something else. Never retried. */
export class ContentMismatchError extends Error {
  constructor(
    public readonly url: string,
    public readonly contentType: string,
  ) {
    super(`Expected a PDF at ${url} but got content type "${contentType || "unknown"}"`);
    this.name = "ContentMismatchError";
  }
}

/** Every text engine in the chain raised for this document. */
export class ExtractionFailedError extends Error {
  constructor(
    public readonly pdfPath: string,
    public readonly causes: string[],
  ) {
    super(`Failed to extract text from ${pdfPath}: ${causes.join("; ")}`);
    this.name = "ExtractionFailedError";
  }
}
