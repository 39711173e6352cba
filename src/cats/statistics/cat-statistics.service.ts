import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { daysBefore, today } from '../../common/dates';
import { percentage, roundTo, toNumberOrNull } from '../../common/numbers';
import { Cat } from '../entities/cat.entity';
import { CatsError, StoreError } from '../errors/cat.errors';
import { CAT_ALIAS } from '../query/cat-query';
import { BreedStatistics, CatStatistics } from '../views/cat.views';

export const RECENT_ADOPTION_DAYS = 30;

type Aggregate = string | number | null;

interface GlobalRow {
  total: Aggregate;
  adopted: Aggregate;
  average_age: Aggregate;
  youngest_age: Aggregate;
  oldest_age: Aggregate;
  neutered: Aggregate;
  recent: Aggregate;
}

interface BreedRow {
  breed: string;
  cat_count: Aggregate;
  adopted_count: Aggregate;
  average_age: Aggregate;
  average_weight: Aggregate;
}

/**
 * Read-only aggregate reports. Each report is a handful of queries with no
 * shared transaction; a write landing between them can skew one report
 * slightly.
 */
@Injectable()
export class CatStatisticsService {
  private readonly logger = new Logger(CatStatisticsService.name);

  constructor(
    @InjectRepository(Cat)
    private readonly cats: Repository<Cat>,
  ) {}

  /**
   * Shelter-wide counts. `breeds_count` counts distinct breed values the way
   * a GROUP BY does, so cats without a breed form one group of their own.
   */
  async globalStatistics(asOf: string = today()): Promise<CatStatistics> {
    return this.read('generate statistics', async () => {
      const row = await this.cats
        .createQueryBuilder(CAT_ALIAS)
        .select(`COUNT(${CAT_ALIAS}.id)`, 'total')
        .addSelect(`COUNT(${CAT_ALIAS}.adoptionDate)`, 'adopted')
        .addSelect(`AVG(${CAT_ALIAS}.age)`, 'average_age')
        .addSelect(`MIN(${CAT_ALIAS}.age)`, 'youngest_age')
        .addSelect(`MAX(${CAT_ALIAS}.age)`, 'oldest_age')
        .addSelect(
          `SUM(CASE WHEN ${CAT_ALIAS}.isNeutered = TRUE THEN 1 ELSE 0 END)`,
          'neutered',
        )
        .addSelect(
          `SUM(CASE WHEN ${CAT_ALIAS}.adoptionDate >= :since AND ${CAT_ALIAS}.adoptionDate <= :asOf THEN 1 ELSE 0 END)`,
          'recent',
        )
        .setParameters({ since: daysBefore(asOf, RECENT_ADOPTION_DAYS), asOf })
        .getRawOne<GlobalRow>();

      const breedGroups = await this.cats
        .createQueryBuilder(CAT_ALIAS)
        .select(`${CAT_ALIAS}.breed`, 'breed')
        .groupBy(`${CAT_ALIAS}.breed`)
        .getRawMany<{ breed: string | null }>();

      const total = toNumberOrNull(row?.total) ?? 0;
      const adopted = toNumberOrNull(row?.adopted) ?? 0;
      const averageAge = toNumberOrNull(row?.average_age);

      return {
        total_cats: total,
        adopted_cats: adopted,
        available_cats: total - adopted,
        adoption_rate: percentage(adopted, total),
        average_age: averageAge === null ? null : roundTo(averageAge, 1),
        youngest_age: toNumberOrNull(row?.youngest_age),
        oldest_age: toNumberOrNull(row?.oldest_age),
        neutered_cats: toNumberOrNull(row?.neutered) ?? 0,
        breeds_count: breedGroups.length,
        recent_adoptions: toNumberOrNull(row?.recent) ?? 0,
      };
    });
  }

  /** One entry per known breed, most common first. */
  async breedStatistics(): Promise<BreedStatistics[]> {
    return this.read('generate breed statistics', async () => {
      const rows = await this.cats
        .createQueryBuilder(CAT_ALIAS)
        .select(`${CAT_ALIAS}.breed`, 'breed')
        .addSelect(`COUNT(${CAT_ALIAS}.id)`, 'cat_count')
        .addSelect(`COUNT(${CAT_ALIAS}.adoptionDate)`, 'adopted_count')
        .addSelect(`AVG(${CAT_ALIAS}.age)`, 'average_age')
        .addSelect(`AVG(${CAT_ALIAS}.weight)`, 'average_weight')
        .where(`${CAT_ALIAS}.breed IS NOT NULL`)
        .groupBy(`${CAT_ALIAS}.breed`)
        .orderBy(`COUNT(${CAT_ALIAS}.id)`, 'DESC')
        .addOrderBy(`${CAT_ALIAS}.breed`, 'ASC')
        .getRawMany<BreedRow>();

      return rows.map((row) => {
        const count = toNumberOrNull(row.cat_count) ?? 0;
        const averageAge = toNumberOrNull(row.average_age);
        const averageWeight = toNumberOrNull(row.average_weight);
        return {
          breed: row.breed,
          count,
          adoption_rate: percentage(toNumberOrNull(row.adopted_count) ?? 0, count),
          average_age: averageAge === null ? null : roundTo(averageAge, 1),
          average_weight: averageWeight === null ? null : roundTo(averageWeight, 2),
        };
      });
    });
  }

  private async read<T>(action: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (error instanceof CatsError) {
        throw error;
      }
      this.logger.error(
        `Failed to ${action}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new StoreError(`Failed to ${action}`, error);
    }
  }
}
