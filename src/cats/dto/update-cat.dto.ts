import { PartialType } from '@nestjs/mapped-types';
import { CreateCatDto } from './create-cat.dto';

/** Body of `PATCH /cats/:id/`: any subset of the create fields. */
export class UpdateCatDto extends PartialType(CreateCatDto) {}
