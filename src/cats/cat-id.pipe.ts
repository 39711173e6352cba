import { Injectable, PipeTransform } from '@nestjs/common';
import { CatNotFoundError } from './errors/cat.errors';

const CAT_ID = /^\d+$/;

/** An id that is not a whole number cannot name a cat, so it is not found. */
@Injectable()
export class CatIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    if (!CAT_ID.test(value)) {
      throw new CatNotFoundError(value);
    }
    return parseInt(value, 10);
  }
}
