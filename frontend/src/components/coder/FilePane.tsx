import React, { useMemo } from 'react';
import type { SessionSnapshot } from '../../types/session';
import { getLanguageForPath } from '../../utils/coder/fileTree';
import { highlightCode } from '../../utils/coder/highlight';
import { DiffViewer } from './DiffViewer';
import 'highlight.js/styles/github-dark.css';

interface FilePaneProps {
  snapshot: SessionSnapshot;
  onShowContent: () => void;
}

/** Selected file, either as a live diff after a revision or as highlighted content. */
export const FilePane: React.FC<FilePaneProps> = ({ snapshot, onShowContent }) => {
  const { selectedFile, viewMode, activeDiff } = snapshot;
  const content = selectedFile ? snapshot.files[selectedFile] ?? '' : '';
  const language = selectedFile ? getLanguageForPath(selectedFile) : 'plaintext';
  const highlighted = useMemo(() => highlightCode(content, language), [content, language]);

  if (!selectedFile) {
    return <div className="file-pane file-pane--empty">Waiting for generated files…</div>;
  }

  if (viewMode === 'diff' && activeDiff && activeDiff.path === selectedFile) {
    return (
      <div className="file-pane">
        <DiffViewer diff={activeDiff} onShowContent={onShowContent} />
      </div>
    );
  }

  // drafts stay unhighlighted until a file_update confirms them
  const draft = snapshot.drafts[selectedFile] ?? '';
  const isWriting = snapshot.targetFile === selectedFile;

  return (
    <div className={`file-pane${isWriting ? ' file-pane--typing' : ''}`}>
      <div className="file-pane__header">{selectedFile}</div>
      <pre className="file-pane__code">
        <code className={`hljs language-${language}`} dangerouslySetInnerHTML={{ __html: highlighted }} />
        {draft && <span className="file-pane__draft">{draft}</span>}
      </pre>
    </div>
  );
};
