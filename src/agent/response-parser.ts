import { isRecord, type Action, type Decision } from '../types';

const CODE_FENCE_RE = /^```[\w-]*\s*|\s*```$/gm;
const FINAL_ANSWER_RE = /Final Answer:\s*(.+)$/is;

// Syntax the model sometimes keeps writing after its final answer
const LEAKAGE_MARKERS = ['\nPlan:', '\nPLAN:', '\nPiano:', '\n```', '\n{', '\n['];

export const stripCodeFences = (text: string): string =>
  text.replace(CODE_FENCE_RE, '').trim();

/**
 * Extracts the body after a "Final Answer:" marker, without fences and
 * without anything after a leakage marker. Null when there is no usable body.
 */
export const cleanFinalAnswer = (text: string): string | null => {
  const match = FINAL_ANSWER_RE.exec(text);
  if (!match) {
    return null;
  }

  let body = stripCodeFences(match[1].trim());
  for (const marker of LEAKAGE_MARKERS) {
    const index = body.indexOf(marker);
    if (index !== -1) {
      body = body.slice(0, index).trim();
    }
  }
  return body || null;
};

const loadJson = (text: string): unknown => {
  try {
    return JSON.parse(stripCodeFences(text));
  } catch {
    return undefined;
  }
};

/**
 * The one place that decides whether a parsed value is an action:
 * a mapping with a string `tool` and a mapping `args`.
 */
export const decodeAction = (value: unknown): Action | null => {
  if (!isRecord(value)) {
    return null;
  }
  const { tool, args } = value;
  if (typeof tool !== 'string' || !isRecord(args)) {
    return null;
  }
  return { tool, args: { ...args } };
};

/**
 * Turns one model reply into a decision. Never throws.
 */
export const parseDecision = (text: string): Decision => {
  const final = cleanFinalAnswer(text);
  if (final !== null) {
    return { type: 'final', text: final };
  }

  const parsed = loadJson(text);

  // A one-element list is checked before a bare object
  if (Array.isArray(parsed)) {
    const action = parsed.length === 1 ? decodeAction(parsed[0]) : null;
    return action ? { type: 'action', action } : { type: 'unparsed' };
  }

  const action = decodeAction(parsed);
  return action ? { type: 'action', action } : { type: 'unparsed' };
};

/**
 * Reads a whole plan: a JSON array of actions, or a single action object.
 * Entries that are not actions are dropped.
 */
export const parsePlan = (text: string): Action[] => {
  const parsed = loadJson(text);
  const candidates: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

  return candidates
    .map((candidate) => decodeAction(candidate))
    .filter((action): action is Action => action !== null);
};
