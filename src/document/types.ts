/**
 * Types for protocol documents.
 *
 * @packageDocumentation
 */

/**
 * JSON shape of a protocol document file.
 */
export interface ProtocolDocumentJson {
  title?: string;
  studyType?: string;
  sections: Record<string, string>;
}

/**
 * A loaded protocol document. Sections keep their order in the file.
 */
export interface ProtocolDocument {
  readonly title?: string;
  readonly studyType?: string;
  readonly sections: ReadonlyMap<string, string>;
  /** Where the document was read from. */
  readonly source: string;
}

/**
 * Error thrown when a protocol document cannot be read or is malformed.
 */
export class DocumentLoadError extends Error {
  /** File path or label of the input. */
  public readonly source: string;
  /** Individual validation failures, if any. */
  public readonly errors: readonly string[];

  constructor(message: string, source: string, errors: readonly string[] = []) {
    super(message);
    this.name = 'DocumentLoadError';
    this.source = source;
    this.errors = errors;
  }
}
