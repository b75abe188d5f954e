export class SearchUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchUnavailableError';
  }
}

export class DocumentNotFoundError extends Error {
  constructor(public readonly documentId: number) {
    super(`Document ${documentId} not found`);
    this.name = 'DocumentNotFoundError';
  }
}
