import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { databaseConfig } from '../config/configuration';
import { Cat } from './entities/cat.entity';
import { CatFields } from './validation/cat.validation';
import seedCats from './seed/cats.json';

/** Fills an empty `cats` table with sample records. */
@Injectable()
export class CatsSeeder implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatsSeeder.name);

  constructor(
    @InjectRepository(Cat)
    private readonly cats: Repository<Cat>,
    @Inject(databaseConfig.KEY)
    private readonly config: ConfigType<typeof databaseConfig>,
  ) {}

  async onApplicationBootstrap() {
    if (this.config.seed) {
      await this.seed();
    }
  }

  /** Number of cats inserted; zero when the table already had rows. */
  async seed(records: CatFields[] = seedCats): Promise<number> {
    if ((await this.cats.count()) > 0) {
      this.logger.log('Cats table is not empty, skipping seed');
      return 0;
    }
    await this.cats.save(records.map((record) => this.cats.create(record)));
    this.logger.log(`Seeded ${records.length} cats`);
    return records.length;
  }
}
