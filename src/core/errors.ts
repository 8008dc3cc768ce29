export type SearchErrorCode =
  | "CONFIGURATION"
  | "INVALID_DOCUMENT"
  | "DUPLICATE_DOCUMENT"
  | "OUT_OF_ORDER_DOCUMENT"
  | "INDEX_SEALED"
  | "BUILD_ABORTED"
  | "BUNDLE_LOAD"
  | "BUNDLE_UNAVAILABLE"
  | "CORPUS";

export class SearchError extends Error {
  readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad stopword or stemmer setup; raised before any build or query runs. */
export class ConfigurationError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

export class InvalidDocumentError extends SearchError {
  constructor(
    readonly index: number,
    readonly path: string,
    message: string,
  ) {
    super("INVALID_DOCUMENT", `document[${index}] ${path}: ${message}`);
  }
}

export class DuplicateDocumentError extends SearchError {
  constructor(readonly docId: number) {
    super("DUPLICATE_DOCUMENT", `duplicate document id ${docId}`);
  }
}

export class OutOfOrderDocumentError extends SearchError {
  constructor(
    readonly docId: number,
    readonly previous: number,
  ) {
    super("OUT_OF_ORDER_DOCUMENT", `document id ${docId} must be greater than ${previous}`);
  }
}

export class IndexSealedError extends SearchError {
  constructor() {
    super("INDEX_SEALED", "index is sealed; rebuild to change the corpus");
  }
}

export class BuildAbortedError extends SearchError {
  constructor(options?: { cause?: unknown }) {
    super("BUILD_ABORTED", "index build aborted", options);
  }
}

/** Stored bundle is unreadable or breaks an index invariant. */
export class BundleLoadError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BUNDLE_LOAD", message, options);
  }
}

export class BundleUnavailableError extends SearchError {
  constructor() {
    super("BUNDLE_UNAVAILABLE", "no index bundle loaded");
  }
}

export class CorpusError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORPUS", message, options);
  }
}
