import { Inject, Injectable, PipeTransform } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { catsConfig } from '../../config/configuration';
import { CatFilters, CatQueryParams, parseCatFilters } from './cat-filters';

/** `@Query(CatFiltersPipe)` turns the raw query string into `CatFilters`. */
@Injectable()
export class CatFiltersPipe implements PipeTransform<CatQueryParams, CatFilters> {
  constructor(
    @Inject(catsConfig.KEY)
    private readonly config: ConfigType<typeof catsConfig>,
  ) {}

  transform(query: CatQueryParams): CatFilters {
    return parseCatFilters(query ?? {}, {
      pageSize: this.config.pageSize,
      maxPageSize: this.config.maxPageSize,
    });
  }
}
