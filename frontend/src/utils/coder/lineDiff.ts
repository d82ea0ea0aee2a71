import type { DiffLine, FileDiff } from '../../types/session';
import { DIFF_CAP_FACTOR, DIFF_LOOKAHEAD } from '../../config/session';
import logger from '../core/logger';

export interface LineDiffOptions {
  /** How many lines ahead in the new text to search for the current old line. */
  lookahead?: number;
  /** Output is capped at `capFactor * max(oldLines, newLines)` entries. */
  capFactor?: number;
}

export interface LineDiffResult {
  lines: DiffLine[];
  truncated: boolean;
}

export const splitLines = (content: string): string[] => (content === '' ? [] : content.split('\n'));

/**
 * Greedy line diff with a bounded lookahead.
 *
 * Equal lines advance both sides. On a mismatch the next `lookahead` new lines are
 * searched for the current old line; a hit turns the skipped new lines into
 * additions, a miss emits one removal and one addition. Linear in the input for a
 * fixed window, at the cost of a non-minimal script on heavily reordered files.
 */
export function diffLinesDetailed(oldContent: string, newContent: string, options: LineDiffOptions = {}): LineDiffResult {
  const lookahead = Math.max(0, Math.floor(options.lookahead ?? DIFF_LOOKAHEAD));
  const capFactor = Math.max(1, options.capFactor ?? DIFF_CAP_FACTOR);

  const a = splitLines(oldContent);
  const b = splitLines(newContent);
  const cap = Math.floor(capFactor * Math.max(a.length, b.length));

  const out: DiffLine[] = [];
  let i = 0;
  let j = 0;

  while ((i < a.length || j < b.length) && out.length < cap) {
    if (i >= a.length) {
      out.push({ type: 'added', content: b[j++] });
      continue;
    }
    if (j >= b.length) {
      out.push({ type: 'removed', content: a[i++] });
      continue;
    }
    if (a[i] === b[j]) {
      out.push({ type: 'unchanged', content: a[i] });
      i++;
      j++;
      continue;
    }

    let skip = 0;
    for (let k = 1; k <= lookahead && j + k < b.length; k++) {
      if (a[i] === b[j + k]) {
        skip = k;
        break;
      }
    }

    if (skip > 0) {
      for (let k = 0; k < skip; k++) {
        out.push({ type: 'added', content: b[j + k] });
      }
      j += skip;
    } else {
      out.push({ type: 'removed', content: a[i] });
      out.push({ type: 'added', content: b[j] });
      i++;
      j++;
    }
  }

  let truncated = i < a.length || j < b.length;
  if (out.length > cap) {
    out.length = cap;
    truncated = true;
  }
  if (truncated) {
    logger.warn(`[LINE_DIFF] output capped at ${cap} entries (old=${a.length}, new=${b.length})`);
  }
  return { lines: out, truncated };
}

export const diffLines = (oldContent: string, newContent: string, options?: LineDiffOptions): DiffLine[] =>
  diffLinesDetailed(oldContent, newContent, options).lines;

/** Diff for display; never throws, falls back to the new content shown as-is. */
export function computeFileDiff(
  path: string,
  oldContent: string,
  newContent: string,
  options?: LineDiffOptions,
  engine: typeof diffLinesDetailed = diffLinesDetailed
): FileDiff {
  try {
    const { lines, truncated } = engine(oldContent, newContent, options);
    return { path, lines, truncated, fallback: false };
  } catch (err) {
    logger.error(`[LINE_DIFF] diff failed for ${path}, showing raw content`, err);
    return {
      path,
      lines: splitLines(newContent).map(content => ({ type: 'unchanged', content })),
      truncated: false,
      fallback: true,
    };
  }
}

export function summarizeDiff(lines: readonly DiffLine[]): { added: number; removed: number; unchanged: number } {
  const summary = { added: 0, removed: 0, unchanged: 0 };
  for (const line of lines) {
    summary[line.type]++;
  }
  return summary;
}
