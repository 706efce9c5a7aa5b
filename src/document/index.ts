/**
 * Protocol document loading.
 *
 * @packageDocumentation
 */

export type { ProtocolDocument, ProtocolDocumentJson } from './types.js';
export { DocumentLoadError } from './types.js';
export {
  DOCUMENT_SCHEMA_PATH,
  loadProtocolDocument,
  parseProtocolDocument,
  parseProtocolDocumentJson,
} from './loader.js';
export { inferStudyType, SYNOPSIS_SECTION } from './study-type.js';
