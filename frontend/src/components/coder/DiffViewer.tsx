import { memo, useMemo } from 'react';
import type { DiffLine, FileDiff } from '../../types/session';
import { summarizeDiff } from '../../utils/coder/lineDiff';
import '../../styles/coder/DiffViewer.css';

interface NumberedDiffLine extends DiffLine {
  originalLineNum: number | null;
  modifiedLineNum: number | null;
}

interface DiffViewerProps {
  diff: FileDiff;
  onShowContent?: () => void;
}

const numberLines = (lines: readonly DiffLine[]): NumberedDiffLine[] => {
  let originalLineNum = 1;
  let modifiedLineNum = 1;
  return lines.map(line => {
    if (line.type === 'added') {
      return { ...line, originalLineNum: null, modifiedLineNum: modifiedLineNum++ };
    }
    if (line.type === 'removed') {
      return { ...line, originalLineNum: originalLineNum++, modifiedLineNum: null };
    }
    return { ...line, originalLineNum: originalLineNum++, modifiedLineNum: modifiedLineNum++ };
  });
};

const PREFIX: Record<DiffLine['type'], string> = {
  added: '+',
  removed: '-',
  unchanged: ' ',
};

const DiffLineRow = memo<{ line: NumberedDiffLine }>(({ line }) => {
  let className = 'diff-line';
  if (line.type === 'added') {
    className += ' diff-line-added';
  } else if (line.type === 'removed') {
    className += ' diff-line-removed';
  }

  const displayLineNum = line.type === 'removed' ? line.originalLineNum : line.modifiedLineNum;

  return (
    <div className={className} data-type={line.type}>
      <span className="diff-line-number">{displayLineNum}</span>
      <span className="diff-line-indicator">{PREFIX[line.type]}</span>
      <span className="diff-line-content">{line.content || ' '}</span>
    </div>
  );
});

DiffLineRow.displayName = 'DiffLineRow';

export const DiffViewer = memo<DiffViewerProps>(({ diff, onShowContent }) => {
  const rows = useMemo(() => numberLines(diff.lines), [diff.lines]);
  const stats = useMemo(() => summarizeDiff(diff.lines), [diff.lines]);

  return (
    <div className="diff-viewer">
      <div className="diff-viewer-header">
        <span className="diff-file-name">{diff.path}</span>
        <span className="diff-stats">
          <span className="diff-stats-added">+{stats.added}</span>{' '}
          <span className="diff-stats-removed">-{stats.removed}</span>
        </span>
        {onShowContent && (
          <button type="button" className="view-normal-btn" onClick={onShowContent}>
            View file
          </button>
        )}
      </div>
      {diff.fallback && <div className="diff-notice">Diff unavailable, showing the new content.</div>}
      {diff.truncated && <div className="diff-notice">Diff truncated.</div>}
      <div className="diff-content">
        {rows.map((line, idx) => (
          <DiffLineRow key={idx} line={line} />
        ))}
      </div>
    </div>
  );
});

DiffViewer.displayName = 'DiffViewer';
