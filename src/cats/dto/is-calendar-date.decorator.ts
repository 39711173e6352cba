import { applyDecorators } from '@nestjs/common';
import { IsISO8601, Matches } from 'class-validator';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** A real calendar date written as `YYYY-MM-DD`, with no time part. */
export function IsCalendarDate() {
  return applyDecorators(
    Matches(CALENDAR_DATE, {
      message: ({ property }) => `${property} must be a date in YYYY-MM-DD format`,
    }),
    IsISO8601({ strict: true }),
  );
}
