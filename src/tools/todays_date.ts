import { z } from 'zod';
import type { ToolHandler } from './registry.js';

export const DATE_FORMATS = ['%Y-%m-%d', '%d', '%m', '%Y'] as const;

export type DateFormat = (typeof DATE_FORMATS)[number];

const TodaysDateArgsSchema = z.object({
  date_format: z.enum(DATE_FORMATS).default('%Y-%m-%d'),
});

type TodaysDateArgs = z.infer<typeof TodaysDateArgsSchema>;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

export function formatDate(date: Date, format: DateFormat): string {
  const year = pad(date.getFullYear(), 4);
  const month = pad(date.getMonth() + 1, 2);
  const day = pad(date.getDate(), 2);
  switch (format) {
    case '%Y-%m-%d':
      return `${year}-${month}-${day}`;
    case '%d':
      return day;
    case '%m':
      return month;
    case '%Y':
      return year;
  }
}

/**
 * `get_todays_date` tool. The clock is injectable for tests.
 */
export function createTodaysDateTool(now: () => Date = () => new Date()): ToolHandler<TodaysDateArgs> {
  return {
    definition: {
      type: 'function',
      function: {
        name: 'get_todays_date',
        description:
          "A tool that returns today's date in the date format requested. Options are: 'YYYY-MM-DD', 'DD', 'MM', 'YYYY'.",
        parameters: {
          type: 'object',
          properties: {
            date_format: {
              type: 'string',
              enum: [...DATE_FORMATS],
              default: '%Y-%m-%d',
              description: "The date format to return today's date in.",
            },
          },
          required: ['date_format'],
        },
      },
    },
    args: TodaysDateArgsSchema,
    run: (args) => formatDate(now(), args.date_format),
  };
}
