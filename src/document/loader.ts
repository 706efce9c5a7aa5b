/**
 * Protocol document loader.
 *
 * Reads a JSON protocol document and checks it against
 * `schemas/protocol-document.schema.json` before handing it to the engine.
 *
 * @packageDocumentation
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import { fileURLToPath } from 'node:url';
import { safeReadFile, safeReadFileSync } from '../utils/safe-fs.js';
import { DocumentLoadError, type ProtocolDocument, type ProtocolDocumentJson } from './types.js';

/**
 * Location of the document schema bundled with the package.
 */
export const DOCUMENT_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/protocol-document.schema.json', import.meta.url)
);

interface DocumentValidator {
  (data: unknown): data is ProtocolDocumentJson;
  errors?: ErrorObject[] | null;
}

let cachedValidator: DocumentValidator | undefined;

function getValidator(): DocumentValidator {
  if (cachedValidator !== undefined) {
    return cachedValidator;
  }
  const ajv = new (Ajv as unknown as new (opts: { allErrors: boolean }) => {
    compile: (schema: Record<string, unknown>) => DocumentValidator;
  })({
    allErrors: true,
  });
  const schema: unknown = JSON.parse(safeReadFileSync(DOCUMENT_SCHEMA_PATH, 'utf-8'));
  if (typeof schema !== 'object' || schema === null || Array.isArray(schema)) {
    throw new Error(`Invalid document schema at ${DOCUMENT_SCHEMA_PATH}`);
  }
  cachedValidator = ajv.compile(Object.fromEntries(Object.entries(schema)));
  return cachedValidator;
}

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath === '' ? '(root)' : error.instancePath;
  return `${location}: ${error.message ?? 'Unknown error'}`;
}

/**
 * Validates parsed JSON as a protocol document.
 *
 * @param data - Parsed JSON.
 * @param source - Label used in error messages.
 * @returns The document with sections as an ordered map.
 * @throws DocumentLoadError if the data does not match the schema.
 *
 * @example
 * ```typescript
 * const doc = parseProtocolDocument({ studyType: 'phase2', sections: { objectives: '...' } });
 * doc.sections.get('objectives'); // '...'
 * ```
 */
export function parseProtocolDocument(data: unknown, source = '<input>'): ProtocolDocument {
  const validate = getValidator();
  if (!validate(data)) {
    const errors = (validate.errors ?? []).map(formatSchemaError);
    throw new DocumentLoadError(
      `Invalid protocol document ${source}: ${errors.join('; ')}`,
      source,
      errors
    );
  }

  const document: ProtocolDocument = {
    sections: new Map(Object.entries(data.sections)),
    source,
  };
  return Object.freeze({
    ...document,
    ...(data.title !== undefined ? { title: data.title } : {}),
    ...(data.studyType !== undefined ? { studyType: data.studyType } : {}),
  });
}

/**
 * Parses a JSON string as a protocol document.
 *
 * @param json - Document text.
 * @param source - Label used in error messages.
 * @throws DocumentLoadError if the text is not JSON or does not match the schema.
 */
export function parseProtocolDocumentJson(json: string, source = '<input>'): ProtocolDocument {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(`Invalid JSON in protocol document ${source}: ${message}`, source);
  }
  return parseProtocolDocument(data, source);
}

/**
 * Reads and validates a protocol document file.
 *
 * @param filePath - Path to the JSON document.
 * @throws DocumentLoadError if the file cannot be read or is malformed.
 */
export async function loadProtocolDocument(filePath: string): Promise<ProtocolDocument> {
  let content: string;
  try {
    content = await safeReadFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new DocumentLoadError(`Protocol document not found: ${filePath}`, filePath);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(`Failed to read protocol document ${filePath}: ${message}`, filePath);
  }
  return parseProtocolDocumentJson(content, filePath);
}
