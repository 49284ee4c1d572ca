export class RagMeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Page reader failure; aborts the whole ingestion call.
export class FetchError extends RagMeError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
  }
}

export class ShapeError extends RagMeError {}

// Raised after the batch has been closed.
export class WriteError extends RagMeError {}

export class VectorStoreError extends RagMeError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
