// status: complete
import { z } from 'zod';
import type { GenerationEvent } from '../../types/session';
import { MalformedEventError } from './errors';
import { compact } from '../core/logger';

const envelope = z.object({ type: z.string() }).passthrough();

const statusEvent = z.object({
  status: z.enum(['connected', 'processing', 'completed', 'failed']),
  message: z.string().nullish(),
});

const promptEvent = z.object({
  prompt: z.string(),
});

const tokenEvent = z.object({
  step: z.string(),
  token: z.string(),
  is_code: z.boolean().nullish(),
});

const fileUpdateEvent = z.object({
  file: z.string().min(1),
  content: z.string(),
});

const stepStartEvent = z.object({
  step: z.string(),
});

const stepCompleteEvent = z.object({
  step: z.string(),
  content: z.string().nullish(),
});

const completeEvent = z.object({
  files: z
    .array(z.object({ name: z.string().min(1), content: z.string() }))
    .nullish(),
});

const errorEvent = z.object({
  message: z.string().nullish(),
});

const chatResponseEvent = z.object({
  message: z.string(),
  file_updates: z.array(fileUpdateEvent).nullish(),
});

function decode<S extends z.ZodTypeAny>(schema: S, data: unknown, type: string, raw: string): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedEventError(`Invalid "${type}" event: ${issues}`, raw);
  }
  return parsed.data;
}

/**
 * Turns one raw channel payload into a typed event.
 *
 * Throws {@link MalformedEventError} for anything that is not a JSON object with a
 * string `type`, or whose known `type` is missing required fields. Unknown types are
 * returned as `unrecognized` so newer backends do not break older clients.
 */
export function parseEvent(raw: string): GenerationEvent {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new MalformedEventError(`Payload is not valid JSON: ${compact(err)}`, raw);
  }

  const head = envelope.safeParse(data);
  if (!head.success) {
    throw new MalformedEventError('Payload is not an object with a string "type"', raw);
  }

  const type = head.data.type;
  switch (type) {
    case 'status': {
      const ev = decode(statusEvent, data, type, raw);
      return { kind: 'status', status: ev.status, message: ev.message ?? '' };
    }
    case 'prompt': {
      const ev = decode(promptEvent, data, type, raw);
      return { kind: 'prompt', prompt: ev.prompt };
    }
    case 'token': {
      const ev = decode(tokenEvent, data, type, raw);
      return { kind: 'token', step: ev.step, token: ev.token, isCode: ev.is_code ?? false };
    }
    case 'file_update': {
      const ev = decode(fileUpdateEvent, data, type, raw);
      return { kind: 'file_update', file: ev.file, content: ev.content };
    }
    case 'step_start': {
      const ev = decode(stepStartEvent, data, type, raw);
      return { kind: 'step_start', step: ev.step };
    }
    case 'step_complete': {
      const ev = decode(stepCompleteEvent, data, type, raw);
      return ev.content == null
        ? { kind: 'step_complete', step: ev.step }
        : { kind: 'step_complete', step: ev.step, content: ev.content };
    }
    case 'complete': {
      const ev = decode(completeEvent, data, type, raw);
      return { kind: 'complete', files: ev.files ?? [] };
    }
    case 'error': {
      const ev = decode(errorEvent, data, type, raw);
      return { kind: 'error', message: ev.message || 'Unknown error' };
    }
    case 'chat_response': {
      const ev = decode(chatResponseEvent, data, type, raw);
      return { kind: 'chat_response', message: ev.message, fileUpdates: ev.file_updates ?? [] };
    }
    default:
      return { kind: 'unrecognized', type, payload: head.data };
  }
}

export type ParseResult =
  | { ok: true; event: GenerationEvent }
  | { ok: false; error: MalformedEventError };

export function tryParseEvent(raw: string): ParseResult {
  try {
    return { ok: true, event: parseEvent(raw) };
  } catch (err) {
    if (err instanceof MalformedEventError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
