import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { adopt, AdoptionRequest, returnToShelter } from './adoption/adoption';
import { Cat } from './entities/cat.entity';
import {
  CatNotFoundError,
  CatsError,
  CatValidationError,
  StoreError,
} from './errors/cat.errors';
import { CatFilters } from './query/cat-filters';
import { applyCatFilters, CAT_ALIAS } from './query/cat-query';
import { CatCandidate, CatFields, validateCat } from './validation/cat.validation';

export interface ReturnedCat {
  cat: Cat;
  formerOwner: string;
}

@Injectable()
export class CatsService {
  private readonly logger = new Logger(CatsService.name);

  constructor(
    @InjectRepository(Cat)
    private readonly cats: Repository<Cat>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async findAll(filters: CatFilters): Promise<Cat[]> {
    return applyCatFilters(this.cats.createQueryBuilder(CAT_ALIAS), filters).getMany();
  }

  findAvailable(filters: CatFilters): Promise<Cat[]> {
    return this.findAll({ ...filters, status: 'available' });
  }

  findAdopted(filters: CatFilters): Promise<Cat[]> {
    return this.findAll({ ...filters, status: 'adopted' });
  }

  /** Matching cats for the requested page plus the total number of matches. */
  async search(filters: CatFilters): Promise<{ cats: Cat[]; count: number }> {
    const [cats, count] = await applyCatFilters(
      this.cats.createQueryBuilder(CAT_ALIAS),
      filters,
    ).getManyAndCount();
    return { cats, count };
  }

  async findOne(id: number): Promise<Cat> {
    return this.findOrFail(this.cats, id);
  }

  async create(candidate: CatCandidate): Promise<Cat> {
    return this.write('create cat', async (cats) => {
      const fields = await this.validate(cats, candidate, null);
      const saved = await cats.save(cats.create(fields));
      this.logger.log(`Created cat ${saved.id} (${saved.name})`);
      return this.findOrFail(cats, saved.id);
    });
  }

  async update(id: number, candidate: CatCandidate): Promise<Cat> {
    return this.write('update cat', async (cats) => {
      const cat = await this.findOrFail(cats, id);
      const fields = await this.validate(cats, candidate, cat);
      await cats.save(cats.merge(cat, fields));
      return this.findOrFail(cats, id);
    });
  }

  async remove(id: number): Promise<void> {
    await this.write('delete cat', async (cats) => {
      const cat = await this.findOrFail(cats, id);
      await cats.remove(cat);
      this.logger.log(`Deleted cat ${id}`);
    });
  }

  /** Available → adopted; both adoption fields are written in one transaction. */
  async adopt(id: number, request: AdoptionRequest): Promise<Cat> {
    return this.write('adopt cat', async (cats) => {
      const cat = await this.findOrFail(cats, id);
      adopt(cat, request);
      await cats.save(cat);
      this.logger.log(`Cat ${id} adopted by ${cat.ownerName}`);
      return this.findOrFail(cats, id);
    });
  }

  /** Adopted → available; both adoption fields are cleared in one transaction. */
  async returnToShelter(id: number): Promise<ReturnedCat> {
    return this.write('return cat to shelter', async (cats) => {
      const cat = await this.findOrFail(cats, id);
      const formerOwner = returnToShelter(cat);
      await cats.save(cat);
      this.logger.log(`Cat ${id} returned to the shelter by ${formerOwner}`);
      return { cat: await this.findOrFail(cats, id), formerOwner };
    });
  }

  private async findOrFail(cats: Repository<Cat>, id: number): Promise<Cat> {
    const cat = await cats.findOneBy({ id });
    if (!cat) {
      throw new CatNotFoundError(id);
    }
    return cat;
  }

  private async validate(
    cats: Repository<Cat>,
    candidate: CatCandidate,
    existing: Cat | null,
  ): Promise<CatFields> {
    const result = await validateCat(candidate, existing, {
      nameExists: (name) =>
        cats
          .createQueryBuilder(CAT_ALIAS)
          .where(`LOWER(${CAT_ALIAS}.name) = :name`, { name: name.toLowerCase() })
          .getCount()
          .then((count) => count > 0),
    });
    if (!result.ok) {
      throw new CatValidationError(result.errors);
    }
    return result.value;
  }

  /**
   * Runs `work` in a transaction. Domain errors pass through untouched;
   * anything else rolls back and becomes a StoreError whose message is safe
   * to return to clients.
   */
  private async write<T>(
    action: string,
    work: (cats: Repository<Cat>) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction((manager) =>
        work(manager.getRepository(Cat)),
      );
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
