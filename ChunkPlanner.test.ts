import { expect } from 'chai';
import { planChunks, splitOverlap, strideFor } from './ChunkPlanner';
import { ConfigurationError } from './Errors';

describe('ChunkPlanner', () => {
  describe('planChunks', () => {
    it('plans a 9000 char text with a 4096 window at half-window offsets', () => {
      const text = 'x'.repeat(9000);
      const chunks = planChunks(text, 4096);

      expect(chunks.map(c => c.startOffset)).to.deep.equal([0, 2048, 4096, 6144, 8192]);
      expect(chunks.map(c => c.text.length)).to.deep.equal([4096, 4096, 4096, 2856, 808]);
      expect(chunks.map(c => c.index)).to.deep.equal([0, 1, 2, 3, 4]);
    });

    it('returns a single chunk when the window exceeds the text', () => {
      expect(planChunks('short()', 4096)).to.deep.equal([{ index: 0, startOffset: 0, text: 'short()' }]);
    });

    it('returns no chunks for empty text', () => {
      expect(planChunks('', 16)).to.deep.equal([]);
    });

    it('covers every character of the text', () => {
      const text = 'abcdefghijklmnopqrstuvwxyz0123456789';
      for (const windowSize of [2, 3, 5, 8, 13, 36, 100]) {
        const chunks = planChunks(text, windowSize);
        expect(chunks[0].startOffset).to.equal(0);
        let coveredUntil = 0;
        for (const chunk of chunks) {
          expect(chunk.startOffset).to.be.at.most(coveredUntil);
          expect(chunk.text).to.equal(text.slice(chunk.startOffset, chunk.startOffset + windowSize));
          coveredUntil = Math.max(coveredUntil, chunk.startOffset + chunk.text.length);
        }
        expect(coveredUntil).to.equal(text.length);
      }
    });

    it('never cuts an astral character in half', () => {
      const chunks = planChunks('ab\u{1F600}cd', 3);

      expect(chunks.map(c => [c.startOffset, c.text])).to.deep.equal([
        [0, 'ab\u{1F600}'],
        [1, 'b\u{1F600}'],
        [2, '\u{1F600}c'],
        [2, '\u{1F600}cd'],
        [4, 'cd'],
        [5, 'd'],
      ]);
    });

    it('is deterministic for identical inputs', () => {
      const text = 'def f():\n    return 1\n'.repeat(40);
      expect(planChunks(text, 64)).to.deep.equal(planChunks(text, 64));
    });

    it('rejects window sizes that cannot advance', () => {
      for (const windowSize of [1, 0, -4, 2.5]) {
        expect(() => planChunks('abc', windowSize)).to.throw(ConfigurationError);
      }
    });
  });

  describe('strideFor', () => {
    it('floors half the window', () => {
      expect(strideFor(4096)).to.equal(2048);
      expect(strideFor(5)).to.equal(2);
      expect(strideFor(2)).to.equal(1);
    });
  });

  describe('splitOverlap', () => {
    it('marks the part an earlier chunk already covered as context', () => {
      const views = splitOverlap(planChunks('abcdefghijkl', 8));

      expect(views.map(v => [v.context, v.fresh])).to.deep.equal([
        ['', 'abcdefgh'],
        ['efgh', 'ijkl'],
        ['ijkl', ''],
      ]);
    });

    it('yields fresh parts that concatenate back to the text', () => {
      const text = 'y = 1\n'.repeat(1500);
      const views = splitOverlap(planChunks(text, 4096));

      expect(views.map(v => v.fresh).join('')).to.equal(text);
      expect(views.map(v => v.fresh.length)).to.deep.equal([4096, 2048, 2048, 808, 0]);
      for (const view of views) {
        expect(view.context + view.fresh).to.equal(view.chunk.text);
      }
    });

    it('keeps surrogate pairs whole in the fresh parts', () => {
      const views = splitOverlap(planChunks('ab\u{1F600}cd', 3));

      expect(views.map(v => v.fresh)).to.deep.equal(['ab\u{1F600}', '', 'c', 'd', '', '']);
      expect(views[2].context).to.equal('\u{1F600}');
    });
  });
});
