/**
 * Run with: node --import tsx --test src/test/ProvenanceCodec.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { decodeProvenance, encodeProvenance, mergeProvenance } from '../main/services/ProvenanceCodec';
import type { Provenance } from '../shared/models';

describe('ProvenanceCodec', () => {
  describe('encodeProvenance', () => {
    it('should sort keys and join entries with semicolons', () => {
      const text = encodeProvenance({
        source_url: 'https://video.example/watch?v=abc',
        downloaded_at: '2026-01-02T03:04:05.000Z'
      });

      assert.strictEqual(
        text,
        'downloaded_at=2026-01-02T03:04:05.000Z;source_url=https://video.example/watch?v%3Dabc'
      );
    });

    it('should escape percent, semicolon and equals only', () => {
      assert.strictEqual(encodeProvenance({ 'a;b': 'x=y%20z' }), 'a%3Bb=x%3Dy%2520z');
    });

    it('should encode an empty map as an empty string', () => {
      assert.strictEqual(encodeProvenance({}), '');
    });
  });

  describe('decodeProvenance', () => {
    it('should decode what encodeProvenance produced', () => {
      const samples: Provenance[] = [
        {},
        { '': '' },
        { key: '' },
        { source_url: 'https://video.example/a b?x=1&y=%41', note: 'semi;colon', 'we=ird%': '%%;==' }
      ];
      for (const sample of samples) {
        assert.deepStrictEqual(decodeProvenance(encodeProvenance(sample)), sample);
      }
    });

    it('should keep URL escapes intact', () => {
      const decoded = decodeProvenance(encodeProvenance({ source_url: 'https://video.example/a%20b' }));
      assert.deepStrictEqual(decoded, { source_url: 'https://video.example/a%20b' });
    });

    it('should accept lowercase escape sequences', () => {
      assert.deepStrictEqual(decodeProvenance('k%3d=v%3b%25'), { 'k=': 'v;%' });
    });

    it('should leave other percent sequences alone', () => {
      assert.deepStrictEqual(decodeProvenance('k=%41%2F'), { k: '%41%2F' });
    });

    it('should return null for text that is not provenance', () => {
      assert.strictEqual(decodeProvenance('Ripped by somebody'), null);
      assert.strictEqual(decodeProvenance('a=1;free text'), null);
    });

    it('should let the last duplicate key win', () => {
      assert.deepStrictEqual(decodeProvenance('a=1;a=2'), { a: '2' });
    });

    it('should split on the first equals sign only', () => {
      assert.deepStrictEqual(decodeProvenance('a=b=c'), { a: 'b=c' });
    });
  });

  describe('mergeProvenance', () => {
    it('should keep existing keys and overwrite updated ones', () => {
      assert.deepStrictEqual(mergeProvenance({ a: '1', b: '2' }, { b: '3', c: '4' }), { a: '1', b: '3', c: '4' });
    });

    it('should return a copy when there are no updates', () => {
      const existing = { a: '1' };
      const merged = mergeProvenance(existing, undefined);
      assert.deepStrictEqual(merged, existing);
      assert.notStrictEqual(merged, existing);
    });
  });
});
