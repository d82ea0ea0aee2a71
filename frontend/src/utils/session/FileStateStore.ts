// status: complete
import type { FileSnapshot } from '../../types/session';
import { MAX_HISTORY_PER_FILE } from '../../config/session';
import logger from '../core/logger';

export interface UpsertResult {
  path: string;
  previous: string;
  current: string;
  created: boolean;
  changed: boolean;
}

export interface FileStateStoreOptions {
  maxHistoryPerFile?: number;
  now?: () => number;
}

interface FileRecord {
  content: string;
  history: FileSnapshot[];
  draft: string;
}

/**
 * Authoritative path -> content map for one session, with per-file version history.
 *
 * Streamed code tokens land in a per-file draft that sits on top of the authoritative
 * content; a full `upsert` replaces the content and drops the draft. The last history
 * entry always equals the authoritative content.
 */
export class FileStateStore {
  private readonly files = new Map<string, FileRecord>();
  private readonly maxHistory: number;
  private readonly now: () => number;
  private lastTimestamp = 0;

  constructor(options: FileStateStoreOptions = {}) {
    this.maxHistory = Math.max(1, options.maxHistoryPerFile ?? MAX_HISTORY_PER_FILE);
    this.now = options.now ?? Date.now;
  }

  /** Replaces a file's content and returns what it replaced ('' for a new file). */
  upsert(path: string, content: string): UpsertResult {
    const existing = this.files.get(path);
    if (!existing) {
      this.files.set(path, { content, history: [this.stamp(content)], draft: '' });
      logger.debug(`[FILE_STORE] created ${path} (${content.length} chars)`);
      return { path, previous: '', current: content, created: true, changed: true };
    }

    const previous = existing.content;
    existing.content = content;
    existing.draft = '';

    const last = existing.history[existing.history.length - 1];
    if (last && last.content === content) {
      logger.debug(`[FILE_STORE] ${path} re-sent with identical content, history unchanged`);
      return { path, previous, current: content, created: false, changed: false };
    }

    this.pushHistory(existing, content);
    logger.debug(`[FILE_STORE] updated ${path} (${previous.length} -> ${content.length} chars, v${existing.history.length})`);
    return { path, previous, current: content, created: false, changed: true };
  }

  /** Adds streamed text to a file's draft, creating the file empty on first sight. */
  appendDraft(path: string, text: string): { created: boolean } {
    const existing = this.files.get(path);
    if (!existing) {
      this.files.set(path, { content: '', history: [this.stamp('')], draft: text });
      logger.debug(`[FILE_STORE] created ${path} from streamed tokens`);
      return { created: true };
    }
    existing.draft += text;
    return { created: false };
  }

  /** Drops every pending draft; returns the paths that had one. */
  discardDrafts(): string[] {
    const dropped: string[] = [];
    this.files.forEach((record, path) => {
      if (record.draft) {
        record.draft = '';
        dropped.push(path);
      }
    });
    return dropped;
  }

  /** Sets content from a replayed or final listing; history is only started for unseen files. */
  seed(path: string, content: string): { created: boolean } {
    const existing = this.files.get(path);
    if (!existing) {
      this.files.set(path, { content, history: [this.stamp(content)], draft: '' });
      return { created: true };
    }
    existing.content = content;
    existing.draft = '';
    const last = existing.history[existing.history.length - 1];
    if (!last || last.content !== content) {
      this.pushHistory(existing, content);
    }
    return { created: false };
  }

  get(path: string): string | undefined {
    return this.files.get(path)?.content;
  }

  draft(path: string): string {
    return this.files.get(path)?.draft ?? '';
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  history(path: string): readonly FileSnapshot[] {
    return this.files.get(path)?.history.slice() ?? [];
  }

  list(): string[] {
    return Array.from(this.files.keys());
  }

  get size(): number {
    return this.files.size;
  }

  contents(): Record<string, string> {
    const out: Record<string, string> = {};
    this.files.forEach((record, path) => {
      out[path] = record.content;
    });
    return out;
  }

  drafts(): Record<string, string> {
    const out: Record<string, string> = {};
    this.files.forEach((record, path) => {
      if (record.draft) out[path] = record.draft;
    });
    return out;
  }

  private pushHistory(record: FileRecord, content: string) {
    record.history.push(this.stamp(content));
    if (record.history.length > this.maxHistory) {
      record.history.splice(0, record.history.length - this.maxHistory);
    }
  }

  private stamp(content: string): FileSnapshot {
    const t = this.now();
    this.lastTimestamp = t > this.lastTimestamp ? t : this.lastTimestamp + 1;
    return { content, timestamp: this.lastTimestamp };
  }
}
