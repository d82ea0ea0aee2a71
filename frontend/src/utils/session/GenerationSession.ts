// status: complete
import type {
  ConnectionStatus,
  ConversationEntry,
  ConversationKind,
  ConversationRole,
  FileDiff,
  GenerationEvent,
  GenerationStatus,
  OutboundMessage,
  ProtocolAnomalyRecord,
  SessionError,
  SessionSnapshot,
  ViewMode,
} from '../../types/session';
import { MAX_ANOMALIES } from '../../config/session';
import { buildFileTree } from '../coder/fileTree';
import { computeFileDiff } from '../coder/lineDiff';
import type { LineDiffOptions } from '../coder/lineDiff';
import type { ProjectApi } from '../api';
import { createWebSocketChannel } from './channel';
import type { ChannelFactory, SessionChannel } from './channel';
import { ChannelFailure, GenerationFailure } from './errors';
import { tryParseEvent } from './eventParser';
import { FileStateStore } from './FileStateStore';
import { StepMachine } from './StepMachine';
import { accumulateToken } from './tokenAccumulator';
import logger from '../core/logger';

export type SessionListener = (snapshot: SessionSnapshot) => void;

type EventOf<K extends GenerationEvent['kind']> = Extract<GenerationEvent, { kind: K }>;

export interface GenerationSessionOptions {
  projectId: string;
  channelFactory?: ChannelFactory;
  api?: ProjectApi;
  diff?: LineDiffOptions;
  maxHistoryPerFile?: number;
  now?: () => number;
}

const GENERATION_STATUSES: readonly GenerationStatus[] = ['pending', 'processing', 'completed', 'failed'];

const isGenerationStatus = (value: string | undefined): value is GenerationStatus =>
  value !== undefined && (GENERATION_STATUSES as readonly string[]).includes(value);

/**
 * Owns one project's generation session: the channel lifecycle, the in-order dispatch
 * of inbound events, and the reconciled read model handed to the views.
 *
 * All mutation happens synchronously inside `handleRaw`, so a file write and the diff
 * derived from it are never observed half-applied.
 */
export class GenerationSession {
  readonly projectId: string;

  private readonly files: FileStateStore;
  private readonly steps: StepMachine;
  private readonly channelFactory: ChannelFactory;
  private readonly api?: ProjectApi;
  private readonly diffOptions?: LineDiffOptions;
  private readonly now: () => number;

  private channel: SessionChannel | null = null;
  private pendingConnect: Promise<void> | null = null;
  private outbox: OutboundMessage[] = [];
  private disposed = false;

  private connection: ConnectionStatus = 'disconnected';
  private reconnecting = false;
  private status: GenerationStatus = 'pending';
  private prompt = '';
  private isGenerating = false;
  private conversation: ConversationEntry[] = [];
  private stepEntryId: number | null = null;
  private nextEntryId = 1;
  private selectedFile: string | null = null;
  private viewMode: ViewMode = 'content';
  private activeDiff: FileDiff | null = null;
  private error: SessionError | null = null;
  private anomalies: ProtocolAnomalyRecord[] = [];

  private version = 0;
  private cached: SessionSnapshot | null = null;
  private listeners = new Set<SessionListener>();

  constructor(options: GenerationSessionOptions) {
    this.projectId = options.projectId;
    this.channelFactory = options.channelFactory ?? createWebSocketChannel;
    this.api = options.api;
    this.diffOptions = options.diff;
    this.now = options.now ?? Date.now;
    this.files = new FileStateStore({ maxHistoryPerFile: options.maxHistoryPerFile, now: this.now });
    this.steps = new StepMachine({ now: this.now, onAnomaly: anomaly => this.recordAnomaly(anomaly) });
  }

  // ---- channel lifecycle ------------------------------------------------

  connect(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new ChannelFailure(`Session ${this.projectId} is closed`));
    }
    if (this.connection === 'connected' && this.channel) {
      return Promise.resolve();
    }
    if (this.pendingConnect) {
      return this.pendingConnect;
    }

    const channel: SessionChannel = this.channelFactory(this.projectId, {
      onMessage: raw => this.handleRaw(raw),
      onClose: info => this.handleChannelClosed(channel, info),
    });
    this.channel = channel;
    this.setConnection('connecting');

    const attempt = channel.open().then(
      () => {
        if (this.disposed || this.channel !== channel) {
          channel.close();
          throw new ChannelFailure(`Session ${this.projectId} closed while connecting`);
        }
        this.reconnecting = false;
        this.setConnection('connected');
        if (!this.flushOutbox()) {
          this.dropChannel(channel);
          throw new ChannelFailure(`Channel for ${this.projectId} closed before the queued messages were sent`);
        }
      },
      (err: unknown) => {
        const failure = err instanceof ChannelFailure ? err : new ChannelFailure(err instanceof Error ? err.message : String(err));
        if (!this.disposed && this.channel === channel) {
          this.channel = null;
          this.reconnecting = false;
          this.setConnection('disconnected');
        }
        logger.warn(`[SESSION] connect failed for ${this.projectId}: ${failure.message}`);
        throw failure;
      }
    );

    const tracked: Promise<void> = attempt.finally(() => {
      if (this.pendingConnect === tracked) this.pendingConnect = null;
    });
    this.pendingConnect = tracked;
    return tracked;
  }

  /** Tears the session down; nothing is mutated or emitted afterwards. */
  close(): void {
    if (this.disposed) return;
    const channel = this.channel;
    this.channel = null;
    this.outbox = [];
    this.reconnecting = false;
    this.setConnection('disconnected');
    this.disposed = true;
    this.listeners.clear();
    channel?.close();
    logger.info(`[SESSION] closed ${this.projectId}`);
  }

  get isClosed(): boolean {
    return this.disposed;
  }

  /**
   * Sends a follow-up request. On a dropped channel, or one that refuses the send,
   * this reconnects first; queued messages go out in order once the channel opens.
   * Returns false when the message
   * was not accepted (blank, or a generation is still running).
   */
  async sendChat(message: string): Promise<boolean> {
    const text = message.trim();
    if (!text) return false;
    if (this.disposed) {
      throw new ChannelFailure(`Session ${this.projectId} is closed`);
    }
    if (this.isGenerating) {
      logger.info(`[SESSION] chat ignored while generating (${this.projectId})`);
      return false;
    }

    this.pushEntry('user', 'message', text);
    this.isGenerating = true;
    this.outbox.push({ type: 'chat', message: text });

    if (this.connection === 'connected' && this.channel) {
      if (this.flushOutbox()) {
        this.commit();
        return true;
      }
      this.dropChannel(this.channel);
    }

    this.reconnecting = true;
    this.commit();
    try {
      await this.connect();
    } catch (err) {
      if (!this.disposed) {
        this.isGenerating = false;
        this.pushEntry('system', 'error', 'Connection lost, the message will be sent on the next successful connect');
        this.commit();
      }
      throw err;
    }
    return true;
  }

  /** Sends queued messages in order; false when the channel refused one, which stays queued. */
  private flushOutbox(): boolean {
    const channel = this.channel;
    if (!channel) return this.outbox.length === 0;
    while (this.outbox.length > 0) {
      const next = this.outbox[0];
      try {
        channel.send(JSON.stringify(next));
      } catch (err) {
        logger.warn(`[SESSION] send failed, keeping ${this.outbox.length} queued message(s)`, err);
        return false;
      }
      this.outbox.shift();
      logger.debug(`[SESSION] sent ${next.type} for ${this.projectId}`);
    }
    return true;
  }

  /** Forgets a channel that can no longer send; its late close event is ignored. */
  private dropChannel(channel: SessionChannel) {
    if (this.channel === channel) this.channel = null;
    channel.close();
    this.setConnection('disconnected');
  }

  private handleChannelClosed(channel: SessionChannel, info: { code?: number; reason?: string }) {
    if (this.disposed || this.channel !== channel) return;
    this.channel = null;
    this.reconnecting = false;
    const failure = new ChannelFailure(`Channel closed${info.reason ? `: ${info.reason}` : ''}`, info.code);
    logger.warn(`[SESSION] ${failure.message} (${this.projectId}), state kept for reconnect`);

    if (this.isGenerating) {
      this.isGenerating = false;
      if (this.steps.markErrored()) {
        this.files.discardDrafts();
        this.finishStepEntry();
      }
      this.pushEntry('system', 'error', 'Connection lost during generation, send a message to reconnect');
    }
    this.setConnection('disconnected');
  }

  private setConnection(next: ConnectionStatus) {
    if (this.connection === next) {
      this.commit();
      return;
    }
    logger.info(`[SESSION] connection ${this.connection} -> ${next} (${this.projectId})`);
    this.connection = next;
    this.commit();
  }

  // ---- inbound dispatch ------------------------------------------------

  /** Channel message entry point. Malformed payloads are logged and dropped untouched. */
  handleRaw(raw: string): void {
    if (this.disposed) return;
    const parsed = tryParseEvent(raw);
    if (!parsed.ok) {
      logger.warn(`[SESSION] discarded malformed event: ${parsed.error.message}`, raw);
      return;
    }
    this.dispatch(parsed.event);
  }

  dispatch(event: GenerationEvent): void {
    if (this.disposed) return;
    let changed = false;
    switch (event.kind) {
      case 'status':
        changed = this.handleStatus(event);
        break;
      case 'prompt':
        changed = this.handlePrompt(event);
        break;
      case 'step_start':
        changed = this.handleStepStart(event);
        break;
      case 'token':
        changed = this.handleToken(event);
        break;
      case 'file_update':
        changed = this.applyFileUpdate(event.file, event.content);
        break;
      case 'step_complete':
        changed = this.handleStepComplete(event);
        break;
      case 'complete':
        changed = this.handleComplete(event);
        break;
      case 'error':
        changed = this.handleError(event);
        break;
      case 'chat_response':
        changed = this.handleChatResponse(event);
        break;
      case 'unrecognized':
        logger.debug(`[SESSION] ignoring unrecognized event type "${event.type}"`);
        break;
    }
    if (changed) this.commit();
  }

  private handleStatus(ev: EventOf<'status'>): boolean {
    switch (ev.status) {
      case 'connected':
        logger.info(`[SESSION] backend acknowledged ${this.projectId}: ${ev.message}`);
        return false;
      case 'processing':
        this.status = 'processing';
        this.isGenerating = true;
        this.pushEntry('system', 'notice', 'Started generating code');
        return true;
      case 'completed':
        this.status = 'completed';
        this.isGenerating = false;
        this.pushEntry('system', 'notice', 'Code generation finished');
        return true;
      case 'failed':
        this.status = 'failed';
        this.isGenerating = false;
        this.error = { message: ev.message, receivedAt: this.now() };
        this.pushEntry('system', 'error', `Code generation failed: ${ev.message}`);
        return true;
    }
  }

  private handlePrompt(ev: EventOf<'prompt'>): boolean {
    if (this.prompt === ev.prompt) return false;
    this.prompt = ev.prompt;
    return true;
  }

  private handleStepStart(ev: EventOf<'step_start'>): boolean {
    const { closed } = this.steps.start(ev.step);
    if (closed) {
      this.finishStepEntry();
      this.files.discardDrafts();
    }
    this.stepEntryId = this.pushEntry('assistant', 'step', '', { step: ev.step, streaming: true }).id;
    return true;
  }

  private handleToken(ev: EventOf<'token'>): boolean {
    const { step, file } = accumulateToken(this.steps, this.files, ev);

    let entry = this.findEntry(this.stepEntryId);
    if (!entry || entry.step !== step.name) {
      entry = this.pushEntry('assistant', 'step', '', { step: step.name, streaming: true });
      this.stepEntryId = entry.id;
    }
    entry.text += ev.token;
    if (ev.isCode) entry.isCode = true;

    if (file) {
      if (this.selectedFile === null) this.selectedFile = file.path;
      if (this.selectedFile === file.path) {
        this.viewMode = 'content';
        this.activeDiff = null;
      }
    }
    return true;
  }

  /** `file_update` semantics: the full content replaces whatever was there or streamed. */
  private applyFileUpdate(path: string, content: string): boolean {
    const hadDraft = this.files.draft(path) !== '';
    const rebound = this.steps.target() !== path && this.steps.bindTarget(path);
    const result = this.files.upsert(path, content);

    if (!result.changed) {
      return hadDraft || rebound;
    }

    if (this.selectedFile === null) this.selectedFile = path;
    if (this.selectedFile === path) {
      if (result.previous === '') {
        this.viewMode = 'content';
        this.activeDiff = null;
      } else {
        this.activeDiff = computeFileDiff(path, result.previous, result.current, this.diffOptions);
        this.viewMode = 'diff';
      }
    }

    this.pushEntry('system', 'notice', result.previous === '' ? `Created file ${path}` : `Updated file ${path}`);
    return true;
  }

  private handleStepComplete(ev: EventOf<'step_complete'>): boolean {
    const closed = this.steps.complete(ev.step, ev.content);
    this.files.discardDrafts();
    this.finishStepEntry();
    return closed !== null;
  }

  private handleComplete(ev: EventOf<'complete'>): boolean {
    ev.files.forEach(file => this.files.seed(file.name, file.content));
    if (this.selectedFile === null) {
      this.selectedFile = this.files.list()[0] ?? null;
    }
    this.status = 'completed';
    this.isGenerating = false;
    this.pushEntry('system', 'notice', `Code generation finished, ${ev.files.length} files generated`);
    return true;
  }

  private handleError(ev: EventOf<'error'>): boolean {
    const failure = new GenerationFailure(ev.message, this.now());
    logger.warn(`[SESSION] generation failed for ${this.projectId}: ${failure.message}`);
    this.status = 'failed';
    this.isGenerating = false;
    this.error = { message: failure.message, receivedAt: failure.receivedAt };
    this.pushEntry('system', 'error', `Error: ${failure.message}`);
    return true;
  }

  private handleChatResponse(ev: EventOf<'chat_response'>): boolean {
    this.pushEntry('assistant', 'message', ev.message);
    this.isGenerating = false;
    ev.fileUpdates.forEach(update => this.applyFileUpdate(update.file, update.content));
    return true;
  }

  // ---- local actions ---------------------------------------------------

  /** Records the user's initial request before the channel reports anything. */
  beginGeneration(prompt: string): void {
    if (this.disposed) return;
    this.prompt = prompt;
    this.pushEntry('user', 'message', prompt);
    this.isGenerating = true;
    this.commit();
  }

  /** Seeds prompt and files from the project endpoint, then opens the channel. */
  async loadProject(): Promise<void> {
    if (!this.api) {
      throw new Error('loadProject requires a ProjectApi');
    }
    const res = await this.api.getProject(this.projectId);
    if (this.disposed) return;
    if (!res.data) {
      throw new Error(res.error || `Failed to load project ${this.projectId}`);
    }

    const project = res.data;
    this.prompt = project.prompt;
    if (project.prompt) this.pushEntry('user', 'message', project.prompt);
    project.files.forEach(file => this.files.seed(file.name, file.content));
    if (this.selectedFile === null) {
      this.selectedFile = this.files.list()[0] ?? null;
    }
    if (isGenerationStatus(project.status)) {
      this.status = project.status;
    }
    if (project.files.length > 0) {
      this.pushEntry('system', 'notice', `Code generation finished, ${project.files.length} files generated`);
    } else if (this.status !== 'completed' && this.status !== 'failed') {
      this.isGenerating = true;
    }
    this.commit();

    await this.connect();
  }

  selectFile(path: string): boolean {
    if (this.disposed || !this.files.has(path)) return false;
    this.selectedFile = path;
    this.viewMode = 'content';
    this.activeDiff = null;
    this.commit();
    return true;
  }

  showContent(): void {
    if (this.disposed || this.viewMode === 'content') return;
    this.viewMode = 'content';
    this.activeDiff = null;
    this.commit();
  }

  /** Diff between the last two recorded versions of a file, or null with fewer than two. */
  getFileDiff(path: string): FileDiff | null {
    const history = this.files.history(path);
    if (history.length < 2) return null;
    const before = history[history.length - 2];
    const after = history[history.length - 1];
    return computeFileDiff(path, before.content, after.content, this.diffOptions);
  }

  getFileHistory(path: string) {
    return this.files.history(path);
  }

  // ---- read model ------------------------------------------------------

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    try {
      listener(this.getSnapshot());
    } catch (err) {
      logger.error(`[SESSION] listener failed on subscribe for ${this.projectId}`, err);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot = (): SessionSnapshot => {
    if (this.cached && this.cached.version === this.version) {
      return this.cached;
    }
    const current = this.steps.current();
    const fileOrder = this.files.list();
    this.cached = {
      projectId: this.projectId,
      connection: this.connection,
      reconnecting: this.reconnecting,
      status: this.status,
      prompt: this.prompt,
      isGenerating: this.isGenerating,
      currentStep: current?.name ?? null,
      targetFile: current?.targetFile ?? null,
      steps: this.steps.list(),
      files: this.files.contents(),
      drafts: this.files.drafts(),
      fileOrder,
      tree: buildFileTree(fileOrder),
      conversation: this.conversation.map(entry => ({ ...entry })),
      selectedFile: this.selectedFile,
      viewMode: this.viewMode,
      activeDiff: this.activeDiff,
      error: this.error,
      anomalies: this.anomalies.slice(),
      version: this.version,
    };
    return this.cached;
  };

  private commit() {
    this.version++;
    if (this.listeners.size === 0) return;
    const snap = this.getSnapshot();
    Array.from(this.listeners).forEach((fn, index) => {
      try {
        fn(snap);
      } catch (err) {
        logger.error(`[SESSION] listener ${index + 1}/${this.listeners.size} failed for ${this.projectId}`, err);
      }
    });
  }

  private pushEntry(
    role: ConversationRole,
    kind: ConversationKind,
    text: string,
    extra: Partial<Pick<ConversationEntry, 'step' | 'isCode' | 'streaming'>> = {}
  ): ConversationEntry {
    const entry: ConversationEntry = { id: this.nextEntryId++, role, kind, text, timestamp: this.now(), ...extra };
    this.conversation.push(entry);
    return entry;
  }

  private findEntry(id: number | null): ConversationEntry | undefined {
    if (id === null) return undefined;
    for (let i = this.conversation.length - 1; i >= 0; i--) {
      if (this.conversation[i].id === id) return this.conversation[i];
    }
    return undefined;
  }

  private finishStepEntry() {
    const entry = this.findEntry(this.stepEntryId);
    if (entry) entry.streaming = false;
    this.stepEntryId = null;
  }

  private recordAnomaly(anomaly: ProtocolAnomalyRecord) {
    this.anomalies.push(anomaly);
    if (this.anomalies.length > MAX_ANOMALIES) {
      this.anomalies.splice(0, this.anomalies.length - MAX_ANOMALIES);
    }
  }
}
