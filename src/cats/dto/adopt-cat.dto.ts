import { IsOptional, IsString, MaxLength } from 'class-validator';
import { IsCalendarDate } from './is-calendar-date.decorator';

/**
 * Body of `POST /cats/:id/adopt/`. A missing or blank owner name passes
 * here and is reported by `adopt` itself.
 */
export class AdoptCatDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  owner_name?: string | null;

  /** Defaults to today. */
  @IsOptional()
  @IsCalendarDate()
  adoption_date?: string | null;
}
