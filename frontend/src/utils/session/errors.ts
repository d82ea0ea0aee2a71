import type { GenerationEventKind, ProtocolAnomalyRecord } from '../../types/session';

/** Inbound payload that could not be turned into a typed event. */
export class MalformedEventError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'MalformedEventError';
    this.raw = raw;
  }
}

/** The backend reported an `error` event. */
export class GenerationFailure extends Error {
  readonly receivedAt: number;

  constructor(message: string, receivedAt: number = Date.now()) {
    super(message);
    this.name = 'GenerationFailure';
    this.receivedAt = receivedAt;
  }
}

/** The transport dropped or never opened. */
export class ChannelFailure extends Error {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = 'ChannelFailure';
    this.code = code;
  }
}

export const protocolAnomaly = (
  code: ProtocolAnomalyRecord['code'],
  message: string,
  event: GenerationEventKind,
  at: number = Date.now()
): ProtocolAnomalyRecord => ({ code, message, event, at });
