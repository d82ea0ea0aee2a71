// status: complete
import type { GenerationEventKind, ProtocolAnomalyRecord, StepState } from '../../types/session';
import { protocolAnomaly } from './errors';
import logger from '../core/logger';

export interface StepMachineOptions {
  onAnomaly?: (anomaly: ProtocolAnomalyRecord) => void;
  now?: () => number;
}

/**
 * Lifecycle of named generation steps: idle -> open -> completed | errored -> idle.
 * At most one step is open; starting another force-completes the previous one.
 */
export class StepMachine {
  private readonly steps: StepState[] = [];
  private open: StepState | null = null;
  private readonly onAnomaly?: (anomaly: ProtocolAnomalyRecord) => void;
  private readonly now: () => number;

  constructor(options: StepMachineOptions = {}) {
    this.onAnomaly = options.onAnomaly;
    this.now = options.now ?? Date.now;
  }

  start(name: string): { closed: StepState | null; opened: StepState } {
    let closed: StepState | null = null;
    if (this.open) {
      logger.debug(`[STEP] auto-closing "${this.open.name}" before "${name}"`);
      closed = this.close('completed');
    }
    return { closed, opened: { ...this.openStep(name) } };
  }

  /**
   * Appends streamed text to the open step. A name that does not match the open step is
   * reported but still appended; with no open step one is opened under the token's name.
   */
  appendToken(step: string, text: string): StepState {
    let target = this.open;
    if (!target) {
      this.report('token_without_step', `token for "${step}" arrived with no open step; opening it`, 'token');
      target = this.openStep(step);
    } else if (target.name !== step) {
      this.report('step_mismatch', `token for "${step}" while "${target.name}" is open`, 'token');
    }
    target.transcript += text;
    return { ...target };
  }

  complete(step: string, content?: string): StepState | null {
    if (!this.open) {
      this.report('complete_without_step', `step_complete for "${step}" with no open step`, 'step_complete');
      return null;
    }
    if (this.open.name !== step) {
      this.report('step_mismatch', `step_complete for "${step}" while "${this.open.name}" is open`, 'step_complete');
    }
    if (content !== undefined) {
      this.open.finalContent = content;
    }
    return this.close('completed');
  }

  /** Aborts the open step, e.g. when the channel drops mid-generation. */
  markErrored(): StepState | null {
    return this.open ? this.close('errored') : null;
  }

  bindTarget(path: string): boolean {
    if (!this.open) return false;
    this.open.targetFile = path;
    return true;
  }

  target(): string | null {
    return this.open?.targetFile ?? null;
  }

  current(): StepState | null {
    return this.open ? { ...this.open } : null;
  }

  list(): StepState[] {
    return this.steps.map(step => ({ ...step }));
  }

  private openStep(name: string): StepState {
    const opened: StepState = {
      name,
      phase: 'open',
      transcript: '',
      targetFile: null,
      startedAt: this.now(),
    };
    this.steps.push(opened);
    this.open = opened;
    logger.info(`[STEP] open "${name}"`);
    return opened;
  }

  private close(phase: 'completed' | 'errored'): StepState | null {
    const step = this.open;
    if (!step) return null;
    step.phase = phase;
    step.targetFile = null;
    step.endedAt = this.now();
    this.open = null;
    logger.info(`[STEP] ${phase} "${step.name}" (${step.transcript.length} chars)`);
    return { ...step };
  }

  private report(code: ProtocolAnomalyRecord['code'], message: string, event: GenerationEventKind) {
    logger.warn(`[STEP] protocol anomaly: ${message}`);
    this.onAnomaly?.(protocolAnomaly(code, message, event, this.now()));
  }
}
