import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DocumentLoadError,
  loadProtocolDocument,
  parseProtocolDocument,
  parseProtocolDocumentJson,
} from './index.js';

function captureError(fn: () => unknown): DocumentLoadError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DocumentLoadError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a DocumentLoadError');
}

describe('Protocol document loader', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'protocol-doc-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('parseProtocolDocument', () => {
    it('should return sections as an ordered map', () => {
      const doc = parseProtocolDocument({
        title: 'Example protocol',
        studyType: 'phase2',
        sections: { synopsis: 'Overview.', objectives: 'tbd' },
      });

      expect(doc.title).toBe('Example protocol');
      expect(doc.studyType).toBe('phase2');
      expect(doc.source).toBe('<input>');
      expect([...doc.sections.entries()]).toEqual([
        ['synopsis', 'Overview.'],
        ['objectives', 'tbd'],
      ]);
    });

    it('should leave optional fields undefined', () => {
      const doc = parseProtocolDocument({ sections: {} });
      expect(doc.studyType).toBeUndefined();
      expect(doc.title).toBeUndefined();
      expect(doc.sections.size).toBe(0);
    });

    it('should reject a document without sections', () => {
      const error = captureError(() => parseProtocolDocument({ studyType: 'phase2' }, 'doc.json'));
      expect(error.source).toBe('doc.json');
      expect(error.errors).toEqual(["(root): must have required property 'sections'"]);
      expect(error.message).toBe(
        "Invalid protocol document doc.json: (root): must have required property 'sections'"
      );
    });

    it('should report every schema violation', () => {
      const error = captureError(() =>
        parseProtocolDocument({ sections: { objectives: 42 }, extra: true })
      );
      expect(error.errors).toContain('/sections/objectives: must be string');
      expect(error.errors).toContain('(root): must NOT have additional properties');
    });

    it('should reject an empty study type', () => {
      const error = captureError(() => parseProtocolDocument({ studyType: '', sections: {} }));
      expect(error.errors).toEqual(['/studyType: must NOT have fewer than 1 characters']);
    });
  });

  describe('parseProtocolDocumentJson', () => {
    it('should reject malformed JSON', () => {
      const error = captureError(() => parseProtocolDocumentJson('{"sections": ', 'broken.json'));
      expect(error.message).toMatch(/^Invalid JSON in protocol document broken\.json: /);
    });
  });

  describe('loadProtocolDocument', () => {
    it('should load a document from disk', async () => {
      const filePath = join(tempDir, 'protocol.json');
      await writeFile(
        filePath,
        JSON.stringify({ studyType: 'phase3', sections: { objectives: 'primary_objective' } })
      );

      const doc = await loadProtocolDocument(filePath);

      expect(doc.source).toBe(filePath);
      expect(doc.studyType).toBe('phase3');
      expect(doc.sections.get('objectives')).toBe('primary_objective');
    });

    it('should report a missing file', async () => {
      const filePath = join(tempDir, 'missing.json');
      await expect(loadProtocolDocument(filePath)).rejects.toThrow(
        `Protocol document not found: ${filePath}`
      );
    });
  });
});
