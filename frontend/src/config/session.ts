// status: complete

// Bounded lookahead keeps the diff linear-ish; raising it trades speed for nicer output
// on reordered files.
export const DIFF_LOOKAHEAD = 5;

// Hard cap on diff entries, as a multiple of the longer input's line count.
export const DIFF_CAP_FACTOR = 2;

// Per-file snapshot history; Infinity keeps every version for the session lifetime.
export const MAX_HISTORY_PER_FILE = Number.POSITIVE_INFINITY;

export const MAX_ANOMALIES = 50;

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.1;

export const AVAILABLE_MODELS = [
  { id: 'gpt-4o-mini', label: 'GPT-4o mini' },
  { id: 'gpt-4o', label: 'GPT-4o' },
] as const;
