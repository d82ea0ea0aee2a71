import { computeFileDiff, diffLines, diffLinesDetailed, splitLines, summarizeDiff } from '../lineDiff';
import logger from '../../core/logger';

describe('lineDiff', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.clearLogs();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('splits on newlines and treats empty content as no lines', () => {
    expect(splitLines('')).toEqual([]);
    expect(splitLines('a\n')).toEqual(['a', '']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('handles empty sides', () => {
    expect(diffLines('', '')).toEqual([]);
    expect(diffLines('', 'x\ny')).toEqual([
      { type: 'added', content: 'x' },
      { type: 'added', content: 'y' },
    ]);
    expect(diffLines('a\nb', '')).toEqual([
      { type: 'removed', content: 'a' },
      { type: 'removed', content: 'b' },
    ]);
  });

  it('marks identical content as unchanged', () => {
    expect(diffLines('a\nb', 'a\nb')).toEqual([
      { type: 'unchanged', content: 'a' },
      { type: 'unchanged', content: 'b' },
    ]);
  });

  it('finds an inserted line within the lookahead window', () => {
    expect(diffLines('a\nb\nc', 'a\nx\nb\nc')).toEqual([
      { type: 'unchanged', content: 'a' },
      { type: 'added', content: 'x' },
      { type: 'unchanged', content: 'b' },
      { type: 'unchanged', content: 'c' },
    ]);
  });

  it('emits a removal and an addition for a replaced line', () => {
    expect(diffLines('a\nb\nc', 'a\nB\nc')).toEqual([
      { type: 'unchanged', content: 'a' },
      { type: 'removed', content: 'b' },
      { type: 'added', content: 'B' },
      { type: 'unchanged', content: 'c' },
    ]);
  });

  it('does not look past the window', () => {
    const next = '1\n2\n3\n4\n5\n6\nz';
    expect(diffLines('z', next)).toEqual([
      { type: 'removed', content: 'z' },
      { type: 'added', content: '1' },
      { type: 'added', content: '2' },
      { type: 'added', content: '3' },
      { type: 'added', content: '4' },
      { type: 'added', content: '5' },
      { type: 'added', content: '6' },
      { type: 'added', content: 'z' },
    ]);
    expect(diffLines('z', next, { lookahead: 6 })).toEqual([
      { type: 'added', content: '1' },
      { type: 'added', content: '2' },
      { type: 'added', content: '3' },
      { type: 'added', content: '4' },
      { type: 'added', content: '5' },
      { type: 'added', content: '6' },
      { type: 'unchanged', content: 'z' },
    ]);
  });

  it('stops at the output cap and reports truncation', () => {
    const result = diffLinesDetailed('a\nb', 'c\nd', { capFactor: 1 });
    expect(result).toEqual({
      lines: [
        { type: 'removed', content: 'a' },
        { type: 'added', content: 'c' },
      ],
      truncated: true,
    });
    expect(logger.getLogs().some(line => line.includes('[LINE_DIFF] output capped at 2 entries'))).toBe(true);
  });

  it('never exceeds twice the longer input by default', () => {
    const oldText = Array.from({ length: 40 }, (_, i) => `old ${i}`).join('\n');
    const newText = Array.from({ length: 40 }, (_, i) => `new ${i}`).join('\n');
    const result = diffLinesDetailed(oldText, newText);
    expect(result.lines).toHaveLength(80);
    expect(result.truncated).toBe(false);
  });

  it('stays within the cap and accounts for every line across varied inputs', () => {
    let seed = 7;
    const rand = (n: number) => {
      seed = (seed * 16807) % 2147483647;
      return seed % n;
    };
    const vocab = ['import os', '', 'def main():', '    pass', 'return x', '}', 'x = 1', '# note'];
    const randomText = (maxLines: number) =>
      Array.from({ length: rand(maxLines + 1) }, () => vocab[rand(vocab.length)]).join('\n');
    const mutate = (text: string) => {
      const lines = splitLines(text);
      for (let n = rand(6); n > 0; n--) {
        const at = rand(lines.length + 1);
        switch (rand(3)) {
          case 0:
            lines.splice(at, 0, vocab[rand(vocab.length)]);
            break;
          case 1:
            lines.splice(at, 1);
            break;
          default:
            lines.reverse();
        }
      }
      return lines.join('\n');
    };

    for (let round = 0; round < 300; round++) {
      const oldText = randomText(25);
      const newText = round % 3 === 0 ? randomText(25) : mutate(oldText);
      const oldLines = splitLines(oldText);
      const newLines = splitLines(newText);

      const { lines, truncated } = diffLinesDetailed(oldText, newText);

      expect(lines.length).toBeLessThanOrEqual(2 * Math.max(oldLines.length, newLines.length));
      expect(truncated).toBe(false);
      expect(lines.filter(l => l.type !== 'added').map(l => l.content)).toEqual(oldLines);
      expect(lines.filter(l => l.type !== 'removed').map(l => l.content)).toEqual(newLines);
    }
  });

  it('falls back to the new content when the engine throws', () => {
    const failing = () => {
      throw new Error('engine down');
    };
    expect(computeFileDiff('a.py', 'x', 'y\nz', undefined, failing)).toEqual({
      path: 'a.py',
      lines: [
        { type: 'unchanged', content: 'y' },
        { type: 'unchanged', content: 'z' },
      ],
      truncated: false,
      fallback: true,
    });
  });

  it('computes a file diff and summarizes it', () => {
    const diff = computeFileDiff('a.py', 'print(1)', 'print(1)\nprint(2)');
    expect(diff).toEqual({
      path: 'a.py',
      lines: [
        { type: 'unchanged', content: 'print(1)' },
        { type: 'added', content: 'print(2)' },
      ],
      truncated: false,
      fallback: false,
    });
    expect(summarizeDiff(diff.lines)).toEqual({ added: 1, removed: 0, unchanged: 1 });
  });
});
