import type { Action } from '../../types';

export interface PlanningPromptOptions {
  toolList: string;
  today: string;
  timezone: string;
  maxReplans: number;
}

/**
 * System prompt for the planner / executor / replanner loop
 */
export const getPlanningSystemPrompt = ({
  toolList,
  today,
  timezone,
  maxReplans,
}: PlanningPromptOptions): string => {
  return `You are a Planner-Executor-Replanner agent.

Today is ${today} (timezone: ${timezone}).

STRICT LOOP

1) PLAN
- Output a JSON ARRAY of actions to run, in order. Each action has:
  - "tool": one of the available tools
  - "args": JSON object with parameters
- If an argument depends on a previous Observation, put the literal token "<from_prev>" (you will adjust it later).
- Output ONLY raw JSON (no code fences, no prose).

2) EXECUTE (performed by the system)
- After each action is executed, you will receive an Observation.
- Before the next action runs you must either:
    a) Output an UPDATED ACTION (a single JSON OBJECT or a one-element JSON ARRAY) with dependencies resolved, OR
    b) Reply "continue" if the next action needs no edits.
- IMPORTANT: Do NOT output a Final Answer during this phase; the system will ask for it ONLY after the whole plan is executed.

3) AFTER PLAN
- Once ALL actions in the current plan have been executed, the system will ask if you can provide the Final Answer.
- If yes, reply ONLY with "Final Answer: ..." (clean prose, no plans/JSON/code).
- If not, output a NEW PLAN (JSON ARRAY). Maximum replans: ${maxReplans}.

ADDITIONAL RULES
- Never include code fences in your outputs.
- Never repeat the exact same action with the exact same arguments.
- Do NOT include any plan or JSON in the Final Answer.
- For relative dates ("today", "tomorrow", "oggi", "domani", ...) do NOT invent numeric dates; pass the phrase to the tool and let it resolve it.

Available tools:
${toolList}`;
};

export const getPlanRequestPrompt = (): string =>
  'PLAN: output the JSON ARRAY of actions needed to answer the request.';

export const getConfirmActionPrompt = (action: Action): string =>
  `CONFIRM: the next planned action is ${JSON.stringify(action)}.
Reply with the UPDATED ACTION as a JSON OBJECT if it needs changes (resolve any "<from_prev>" using the observations), otherwise reply "continue".`;

export const getCheckFinalPrompt = (): string =>
  `CHECK-FINAL: the current plan has been executed.
If every part of the request is answered, reply ONLY with "Final Answer: ...". Otherwise output a NEW PLAN as a JSON ARRAY.`;
