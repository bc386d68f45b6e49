import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { computeChunks } from '../../src/diff/chunks.js';

describe('computeChunks', () => {
  it('returns no chunks for two empty strings', () => {
    expect(computeChunks('', '')).toEqual([]);
  });

  it('returns a single equal chunk for identical text', () => {
    expect(computeChunks('same', 'same')).toEqual([{ op: 'equal', text: 'same' }]);
  });

  it('orders a replacement as delete then insert', () => {
    expect(computeChunks('abc\ndef\n', 'abc\nxyz\n')).toEqual([
      { op: 'equal', text: 'abc\n' },
      { op: 'delete', text: 'def' },
      { op: 'insert', text: 'xyz' },
      { op: 'equal', text: '\n' },
    ]);
  });

  it('rebuilds both sides from the chunks', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (oldText, newText) => {
        const chunks = computeChunks(oldText, newText);
        const oldSide = chunks.filter((c) => c.op !== 'insert').map((c) => c.text).join('');
        const newSide = chunks.filter((c) => c.op !== 'delete').map((c) => c.text).join('');
        expect(oldSide).toBe(oldText);
        expect(newSide).toBe(newText);
      })
    );
  });
});
