import { TestingModule } from '@nestjs/testing';
import {
  catFields,
  createCatsTestingModule,
  insertCats,
} from '../../test/helpers/cats-testing.module';
import { CatsSeeder } from './cats.seeder';
import { CatsService } from './cats.service';
import { DEFAULT_ORDERING } from './query/cat-filters';
import seedCats from './seed/cats.json';

describe('CatsSeeder', () => {
  let moduleRef: TestingModule;
  let seeder: CatsSeeder;
  let service: CatsService;

  beforeEach(async () => {
    moduleRef = await createCatsTestingModule();
    seeder = moduleRef.get(CatsSeeder);
    service = moduleRef.get(CatsService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('loads the bundled sample cats into an empty table', async () => {
    await expect(seeder.seed()).resolves.toBe(seedCats.length);

    const cats = await service.findAll({ ordering: DEFAULT_ORDERING });
    expect(cats.map((cat) => cat.name)).toEqual(seedCats.map((cat) => cat.name));
    expect(cats.every((cat) => (cat.ownerName === null) === (cat.adoptionDate === null))).toBe(
      true,
    );
  });

  it('leaves a populated table alone', async () => {
    await insertCats(moduleRef, [{ name: 'Resident' }]);

    await expect(seeder.seed([catFields({ name: 'Newcomer' })])).resolves.toBe(0);
    expect(await service.findAll({ ordering: DEFAULT_ORDERING })).toHaveLength(1);
  });

  it('does not seed on startup unless configured to', async () => {
    await seeder.onApplicationBootstrap();

    expect(await service.findAll({ ordering: DEFAULT_ORDERING })).toEqual([]);
  });
});
