/**
 * src/modules/report/report.schemas.ts
 *
 * WHY:
 * - Validates report parameters before any external lookup runs.
 *
 * RULES:
 * - Dates are YYYY-MM-DD and must exist on the calendar (no 2024-02-30).
 * - start <= end (string comparison is safe for this format).
 */

import { z } from 'zod';

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export const reportDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be formatted YYYY-MM-DD')
  .refine(isCalendarDate, 'Date is not a valid calendar date');

export const generateReportSchema = z
  .object({
    groupId: z.string().trim().min(1, 'Group id is required'),
    start: reportDateSchema,
    end: reportDateSchema,
    quotaFile: z.string().min(1).optional(),
  })
  .refine((v) => v.start <= v.end, {
    message: 'Start date must not be after end date',
    path: ['end'],
  });

export type GenerateReportInput = z.infer<typeof generateReportSchema>;
