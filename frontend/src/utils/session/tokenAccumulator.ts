import type { GenerationEvent, StepState } from '../../types/session';
import type { FileStateStore } from './FileStateStore';
import type { StepMachine } from './StepMachine';
import logger, { sample } from '../core/logger';

export interface TokenAccumulation {
  step: StepState;
  /** Set when the token was code and went into a file draft. */
  file: { path: string; created: boolean } | null;
}

/**
 * Routes one token: always into the open step's transcript, and for code tokens also
 * into the draft of the file the step is currently writing. Code that arrives before
 * any file is targeted stays in the transcript only.
 */
export function accumulateToken(
  steps: StepMachine,
  files: FileStateStore,
  event: Extract<GenerationEvent, { kind: 'token' }>
): TokenAccumulation {
  const step = steps.appendToken(event.step, event.token);

  if (!event.isCode) {
    return { step, file: null };
  }

  const path = steps.target();
  if (!path) {
    if (sample('token-untargeted', 50)) {
      logger.debug(`[TOKENS] code for "${event.step}" held in transcript, no target file yet`);
    }
    return { step, file: null };
  }

  const { created } = files.appendDraft(path, event.token);
  return { step, file: { path, created } };
}
