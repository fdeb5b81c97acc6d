import { describe, it, expect } from 'vitest';
import {
  cleanFinalAnswer,
  parseDecision,
  parsePlan,
  stripCodeFences,
} from './response-parser';

describe('stripCodeFences', () => {
  it('removes an opening fence with a language tag and the closing fence', () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('leaves unfenced text untouched apart from trimming', () => {
    expect(stripCodeFences('  hello  ')).toBe('hello');
  });
});

describe('cleanFinalAnswer', () => {
  it('returns the body after the marker', () => {
    expect(cleanFinalAnswer('Final Answer: 2024-01-15.')).toBe('2024-01-15.');
  });

  it('matches the marker in any case and trims the body', () => {
    expect(cleanFinalAnswer('final ANSWER:   Rome is sunny  ')).toBe('Rome is sunny');
  });

  it('ignores reasoning written before the marker', () => {
    expect(cleanFinalAnswer('Thought: I am done\nFinal Answer: 42')).toBe('42');
  });

  it('strips code fences around the body', () => {
    expect(cleanFinalAnswer('Final Answer: ```\nIt will rain.\n```')).toBe(
      'It will rain.',
    );
  });

  it('cuts the body at a leaked plan', () => {
    expect(
      cleanFinalAnswer('Final Answer: It is 18 degrees.\nPlan: [{"tool":"x"}]'),
    ).toBe('It is 18 degrees.');
  });

  it('cuts the body at an upper-case plan marker', () => {
    expect(cleanFinalAnswer('Final Answer: Sunny.\nPLAN: retry')).toBe('Sunny.');
  });

  it('keeps the contents of a fenced block that follows the answer', () => {
    expect(cleanFinalAnswer('Final Answer: ok\n```python\nprint(1)\n```')).toBe(
      'ok\nprint(1)',
    );
  });

  it('cuts the body at leaked JSON', () => {
    expect(
      cleanFinalAnswer('Final Answer: Done.\n{"tool":"date_math","args":{}}'),
    ).toBe('Done.');
  });

  it('cuts the body at the earliest of several leakage markers', () => {
    expect(cleanFinalAnswer('Final Answer: Done.\n[1]\nPiano: again')).toBe('Done.');
  });

  it('treats an empty body as no answer', () => {
    expect(cleanFinalAnswer('Final Answer:   ')).toBeNull();
    expect(cleanFinalAnswer('Final Answer: ```')).toBeNull();
  });

  it('returns null without the marker', () => {
    expect(cleanFinalAnswer('The answer is 42')).toBeNull();
  });

  it('does not match again on an already cleaned body', () => {
    const body = cleanFinalAnswer('Final Answer: 2024-01-15.');
    expect(body).toBe('2024-01-15.');
    expect(cleanFinalAnswer(body ?? '')).toBeNull();
    expect(parseDecision(body ?? '')).toEqual({ type: 'unparsed' });
  });
});

describe('parseDecision', () => {
  it('returns a final decision before looking for an action', () => {
    expect(parseDecision('Final Answer: Sunny in Rome.')).toEqual({
      type: 'final',
      text: 'Sunny in Rome.',
    });
  });

  it('reads a bare action object', () => {
    expect(
      parseDecision('{"tool":"date_math","args":{"operation":"add","days":5}}'),
    ).toEqual({
      type: 'action',
      action: { tool: 'date_math', args: { operation: 'add', days: 5 } },
    });
  });

  it('reads a fenced one-element action list', () => {
    expect(
      parseDecision('```json\n[{"tool":"web_search","args":{"query":"rome"}}]\n```'),
    ).toEqual({
      type: 'action',
      action: { tool: 'web_search', args: { query: 'rome' } },
    });
  });

  it('rejects a list with more than one action', () => {
    expect(
      parseDecision('[{"tool":"a","args":{}},{"tool":"b","args":{}}]'),
    ).toEqual({ type: 'unparsed' });
  });

  it('rejects args that are not a mapping', () => {
    expect(parseDecision('{"tool":"a","args":"x"}')).toEqual({ type: 'unparsed' });
    expect(parseDecision('{"tool":"a","args":[1]}')).toEqual({ type: 'unparsed' });
  });

  it('rejects objects missing tool or args', () => {
    expect(parseDecision('{"tool":"a"}')).toEqual({ type: 'unparsed' });
    expect(parseDecision('{"args":{}}')).toEqual({ type: 'unparsed' });
  });

  it('never throws on text that is not structured data', () => {
    for (const text of ['', 'I should search the web', '{broken', 'null', '42', '"text"']) {
      expect(parseDecision(text)).toEqual({ type: 'unparsed' });
    }
  });
});

describe('parsePlan', () => {
  it('keeps every action of an array and drops the rest', () => {
    expect(
      parsePlan('[{"tool":"a","args":{}}, 5, {"tool":"b","args":{"k":1}}]'),
    ).toEqual([
      { tool: 'a', args: {} },
      { tool: 'b', args: { k: 1 } },
    ]);
  });

  it('accepts a single action object as a one-step plan', () => {
    expect(parsePlan('{"tool":"a","args":{"x":true}}')).toEqual([
      { tool: 'a', args: { x: true } },
    ]);
  });

  it('returns an empty plan for prose', () => {
    expect(parsePlan('continue')).toEqual([]);
  });
});
