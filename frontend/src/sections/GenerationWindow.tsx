import React from 'react';
import { Panel, PanelGroup, PanelResizeHandle } from 'react-resizable-panels';
import { FileTree } from '../components/coder/FileTree';
import { FilePane } from '../components/coder/FilePane';
import { ConversationPanel } from '../components/coder/ConversationPanel';
import { StatusBar } from '../components/coder/StatusBar';
import { useGenerationSession } from '../hooks/session/useGenerationSession';
import type { UseGenerationSessionOptions } from '../hooks/session/useGenerationSession';
import logger from '../utils/core/logger';
import '../styles/sections/GenerationWindow.css';

interface GenerationWindowProps extends UseGenerationSessionOptions {
  projectId: string;
  onBackToHome?: () => void;
}

export const GenerationWindow: React.FC<GenerationWindowProps> = ({ projectId, onBackToHome, ...sessionOptions }) => {
  const { snapshot, connectionError, sendChat, selectFile, showContent } = useGenerationSession(projectId, sessionOptions);

  if (!snapshot) {
    return <div className="generation-window generation-window--loading">Loading project…</div>;
  }

  return (
    <div className="generation-window">
      <header className="generation-window__header">
        {onBackToHome && (
          <button type="button" className="back-btn" onClick={onBackToHome}>
            ← New project
          </button>
        )}
        <h1 className="generation-window__title" title={snapshot.prompt}>
          {snapshot.prompt || projectId}
        </h1>
        <button type="button" className="logs-btn" title="Download client logs" onClick={logger.downloadLogs}>
          Logs
        </button>
      </header>

      {connectionError && (
        <div className="generation-window__error" role="alert">
          {connectionError}
        </div>
      )}
      {snapshot.error && (
        <div className="generation-window__error" role="alert">
          {snapshot.error.message}
        </div>
      )}

      <PanelGroup direction="horizontal" className="generation-window__panels">
        <Panel defaultSize={20} minSize={12}>
          <FileTree
            tree={snapshot.tree}
            selectedFile={snapshot.selectedFile}
            activeFile={snapshot.targetFile}
            onSelect={selectFile}
          />
        </Panel>
        <PanelResizeHandle className="resize-handle" />
        <Panel defaultSize={50} minSize={25}>
          <FilePane snapshot={snapshot} onShowContent={showContent} />
        </Panel>
        <PanelResizeHandle className="resize-handle" />
        <Panel defaultSize={30} minSize={20}>
          <ConversationPanel entries={snapshot.conversation} isGenerating={snapshot.isGenerating} onSend={sendChat} />
        </Panel>
      </PanelGroup>

      <StatusBar
        status={snapshot.status}
        connection={snapshot.connection}
        reconnecting={snapshot.reconnecting}
        currentStep={snapshot.currentStep}
        fileCount={snapshot.fileOrder.length}
        anomalyCount={snapshot.anomalies.length}
      />
    </div>
  );
};
