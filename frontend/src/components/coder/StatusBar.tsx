import React from 'react';
import type { ConnectionStatus, GenerationStatus } from '../../types/session';

const STATUS_TEXT: Record<GenerationStatus, string> = {
  pending: 'Pending',
  processing: 'Generating',
  completed: 'Completed',
  failed: 'Failed',
};

const CONNECTION_TEXT: Record<ConnectionStatus, string> = {
  disconnected: 'Disconnected',
  connecting: 'Connecting…',
  connected: 'Connected',
};

export const getStatusText = (status: GenerationStatus): string => STATUS_TEXT[status];

interface StatusBarProps {
  status: GenerationStatus;
  connection: ConnectionStatus;
  reconnecting?: boolean;
  currentStep?: string | null;
  fileCount?: number;
  anomalyCount?: number;
}

export const StatusBar: React.FC<StatusBarProps> = ({
  status,
  connection,
  reconnecting = false,
  currentStep = null,
  fileCount = 0,
  anomalyCount = 0,
}) => {
  return (
    <div className="status-bar">
      <div className="status-bar__left">
        <span className={`status-badge status-${status}`} data-testid="generation-status">
          {getStatusText(status)}
        </span>
        {currentStep && (
          <span className="status-bar__item" title="Current step">
            {currentStep}
          </span>
        )}
      </div>

      <div className="status-bar__right">
        <span className="status-bar__item">{fileCount} file{fileCount === 1 ? '' : 's'}</span>
        {anomalyCount > 0 && (
          <span className="status-bar__item status-bar__warning" title={`${anomalyCount} protocol warning(s)`}>
            ⚠ {anomalyCount}
          </span>
        )}
        <span className={`status-bar__item status-bar__connection--${connection}`} data-testid="connection-status">
          {reconnecting && connection === 'connecting' ? 'Reconnecting…' : CONNECTION_TEXT[connection]}
        </span>
      </div>
    </div>
  );
};
