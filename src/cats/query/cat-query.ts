import { Brackets, SelectQueryBuilder, WhereExpressionBuilder } from 'typeorm';
import { Cat } from '../entities/cat.entity';
import { CatFilters, SortKey } from './cat-filters';

export const CAT_ALIAS = 'cat';

const SORT_COLUMNS: Record<SortKey, string> = {
  id: `${CAT_ALIAS}.id`,
  name: `${CAT_ALIAS}.name`,
  age: `${CAT_ALIAS}.age`,
  weight: `${CAT_ALIAS}.weight`,
  created_at: `${CAT_ALIAS}.createdAt`,
};

const SEARCH_COLUMNS = ['name', 'breed', 'color', 'description'] as const;

/** `%value%` for a case-insensitive LIKE, with wildcards in `value` escaped. */
export function containsPattern(value: string): string {
  return `%${value.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

function whereContains(
  qb: WhereExpressionBuilder,
  column: string,
  parameter: string,
  value: string,
  combine: 'and' | 'or' = 'and',
) {
  const condition = `LOWER(${CAT_ALIAS}.${column}) LIKE :${parameter} ESCAPE '\\'`;
  const parameters = { [parameter]: containsPattern(value) };
  return combine === 'and'
    ? qb.andWhere(condition, parameters)
    : qb.orWhere(condition, parameters);
}

/**
 * Narrows, orders and pages `qb` according to `filters`. Booleans are
 * written as SQL literals since not every driver binds them.
 */
export function applyCatFilters(
  qb: SelectQueryBuilder<Cat>,
  filters: CatFilters,
): SelectQueryBuilder<Cat> {
  if (filters.status === 'available') {
    qb.andWhere(`${CAT_ALIAS}.adoptionDate IS NULL`);
  } else if (filters.status === 'adopted') {
    qb.andWhere(`${CAT_ALIAS}.adoptionDate IS NOT NULL`);
  }

  if (filters.available !== undefined) {
    qb.andWhere(
      `${CAT_ALIAS}.adoptionDate ${filters.available ? 'IS NULL' : 'IS NOT NULL'}`,
    );
  }

  if (filters.neutered !== undefined) {
    qb.andWhere(`${CAT_ALIAS}.isNeutered = ${filters.neutered ? 'TRUE' : 'FALSE'}`);
  }

  if (filters.breed !== undefined) {
    whereContains(qb, 'breed', 'breed', filters.breed);
  }
  if (filters.name !== undefined) {
    whereContains(qb, 'name', 'name', filters.name);
  }
  if (filters.color !== undefined) {
    whereContains(qb, 'color', 'color', filters.color);
  }

  if (filters.minAge !== undefined) {
    qb.andWhere(`${CAT_ALIAS}.age >= :minAge`, { minAge: filters.minAge });
  }
  if (filters.maxAge !== undefined) {
    qb.andWhere(`${CAT_ALIAS}.age <= :maxAge`, { maxAge: filters.maxAge });
  }

  filters.search?.forEach((term, index) => {
    qb.andWhere(
      new Brackets((or) => {
        SEARCH_COLUMNS.forEach((column) =>
          whereContains(or, column, `search${index}`, term, 'or'),
        );
      }),
    );
  });

  const { key, direction } = filters.ordering;
  qb.orderBy(SORT_COLUMNS[key], direction);
  if (key !== 'id') {
    qb.addOrderBy(SORT_COLUMNS.id, 'ASC');
  }

  if (filters.page) {
    qb.offset((filters.page.number - 1) * filters.page.size).limit(filters.page.size);
  }

  return qb;
}
