// status: complete

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

export type GenerationStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type BackendStatus = 'connected' | 'processing' | 'completed' | 'failed';

export interface GeneratedFile {
  name: string;
  content: string;
}

export interface FileUpdatePayload {
  file: string;
  content: string;
}

export type GenerationEvent =
  | { kind: 'status'; status: BackendStatus; message: string }
  | { kind: 'prompt'; prompt: string }
  | { kind: 'token'; step: string; token: string; isCode: boolean }
  | { kind: 'file_update'; file: string; content: string }
  | { kind: 'step_start'; step: string }
  | { kind: 'step_complete'; step: string; content?: string }
  | { kind: 'complete'; files: GeneratedFile[] }
  | { kind: 'error'; message: string }
  | { kind: 'chat_response'; message: string; fileUpdates: FileUpdatePayload[] }
  | { kind: 'unrecognized'; type: string; payload: Record<string, unknown> };

export type GenerationEventKind = GenerationEvent['kind'];

export type OutboundMessage = { type: 'chat'; message: string };

export interface FileSnapshot {
  content: string;
  timestamp: number;
}

export type StepPhase = 'open' | 'completed' | 'errored';

export interface StepState {
  name: string;
  phase: StepPhase;
  transcript: string;
  /** Raw `content` carried by the step_complete event, when the backend sends one. */
  finalContent?: string;
  targetFile: string | null;
  startedAt: number;
  endedAt?: number;
}

export type DiffLineType = 'unchanged' | 'added' | 'removed';

export interface DiffLine {
  type: DiffLineType;
  content: string;
}

export interface FileDiff {
  path: string;
  lines: DiffLine[];
  truncated: boolean;
  fallback: boolean;
}

export type FileTreeNode =
  | { type: 'folder'; name: string; path: string; children: FileTreeNode[] }
  | { type: 'file'; name: string; path: string };

export type ConversationRole = 'user' | 'assistant' | 'system';

export type ConversationKind = 'message' | 'step' | 'notice' | 'error';

export interface ConversationEntry {
  id: number;
  role: ConversationRole;
  kind: ConversationKind;
  text: string;
  step?: string;
  isCode?: boolean;
  streaming?: boolean;
  timestamp: number;
}

export interface ProtocolAnomalyRecord {
  code: 'step_mismatch' | 'token_without_step' | 'complete_without_step';
  message: string;
  event: GenerationEventKind;
  at: number;
}

export interface SessionError {
  message: string;
  receivedAt: number;
}

export type ViewMode = 'content' | 'diff';

export interface SessionSnapshot {
  projectId: string;
  connection: ConnectionStatus;
  /** True while a connect was triggered by a send on a dropped channel. */
  reconnecting: boolean;
  status: GenerationStatus;
  prompt: string;
  isGenerating: boolean;
  currentStep: string | null;
  targetFile: string | null;
  steps: StepState[];
  files: Record<string, string>;
  /** Streamed code not yet confirmed by a file_update, keyed by path. */
  drafts: Record<string, string>;
  fileOrder: string[];
  tree: FileTreeNode[];
  conversation: ConversationEntry[];
  selectedFile: string | null;
  viewMode: ViewMode;
  activeDiff: FileDiff | null;
  error: SessionError | null;
  anomalies: ProtocolAnomalyRecord[];
  version: number;
}
