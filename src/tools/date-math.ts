import { z } from 'zod';
import type { Tool } from '../types';
import { addDays, diffDays, weekdayOf } from '../utils/dates';
import type { DateResolver } from './date-resolver';

const OPERATIONS = ['add', 'sub', 'diff', 'range'] as const;

export const dateMathSchema = z.object({
  operation: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(OPERATIONS, {
      errorMap: () => ({
        message: 'operation must be one of: add, sub, diff, range',
      }),
    }),
  ),
  date: z.string().optional().describe('Base or start date (ISO or phrase)'),
  days: z.coerce.number().int().optional().describe('Days to add or subtract'),
  end_date: z.string().optional().describe('End date for diff/range'),
});

export const dateParseSchema = z.object({
  target_date: z
    .string()
    .min(1)
    .describe('Date expression such as "2024-05-01", "tomorrow" or "domani"'),
});

export const createDateMathTool = (resolver: DateResolver): Tool => ({
  name: 'date_math',
  description:
    'Calculate date offsets and intervals. Dates may be ISO (YYYY-MM-DD) or natural phrases.',
  argsSchema: dateMathSchema,
  execute: async (args) => {
    const { operation, date, days, end_date: endDate } =
      dateMathSchema.parse(args);

    if (operation === 'add' || operation === 'sub') {
      if (date === undefined || days === undefined) {
        throw new Error("add/sub require 'date' and 'days'");
      }
      const base = await resolver.resolve(date);
      const delta = operation === 'sub' ? -days : days;
      return { operation, base, days, result: addDays(base, delta) };
    }

    if (date === undefined || endDate === undefined) {
      throw new Error("diff/range require 'date' (start) and 'end_date' (end)");
    }
    const start = await resolver.resolve(date);
    const end = await resolver.resolve(endDate);
    const span = diffDays(start, end);

    return operation === 'diff'
      ? { operation, start, end, days: span }
      : { operation, start, end, days_inclusive: span + 1 };
  },
});

export const createDateParseTool = (resolver: DateResolver): Tool => ({
  name: 'date_parse',
  description: 'Resolve a date expression to an ISO date and weekday.',
  argsSchema: dateParseSchema,
  execute: async (args) => {
    const { target_date: input } = dateParseSchema.parse(args);
    const date = await resolver.resolve(input);
    return { input, date, weekday: weekdayOf(date) };
  },
});
