import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { IsCalendarDate } from './is-calendar-date.decorator';

/**
 * Body of `POST /cats/` and `PUT /cats/:id/`. Only JSON types and column
 * widths are checked here; the shelter's rules live in `validateCat`.
 */
export class CreateCatDto {
  @IsString()
  @MaxLength(100)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  breed?: string | null;

  @IsOptional()
  @IsInt()
  age?: number | null;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  color?: string | null;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  weight?: number | null;

  @IsOptional()
  @IsBoolean()
  is_neutered?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  owner_name?: string | null;

  @IsOptional()
  @IsCalendarDate()
  adoption_date?: string | null;

  @IsOptional()
  @IsString()
  description?: string | null;
}
