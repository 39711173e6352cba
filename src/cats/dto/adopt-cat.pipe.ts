import { Injectable, PipeTransform } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AdoptionRequest } from '../adoption/adoption';
import { AdoptionRequestError } from '../errors/cat.errors';
import { AdoptCatDto } from './adopt-cat.dto';

/**
 * Validates an adoption body against `AdoptCatDto`. Adoption failures are
 * answered with one `{ error }` message, so the first problem found is the
 * one reported.
 */
@Injectable()
export class AdoptCatPipe implements PipeTransform<unknown, AdoptionRequest> {
  transform(body: unknown): AdoptionRequest {
    const plain: object = typeof body === 'object' && body !== null ? body : {};
    const dto = plainToInstance(AdoptCatDto, plain);
    const [error] = validateSync(dto, { whitelist: true, stopAtFirstError: true });

    if (error) {
      const [message] = Object.values(error.constraints ?? {});
      throw new AdoptionRequestError(message ?? `${error.property} is invalid`);
    }

    return { ownerName: dto.owner_name, adoptionDate: dto.adoption_date };
  }
}
