import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { Cat } from '../src/cats/entities/cat.entity';
import { CatDetail } from '../src/cats/views/cat.views';

describe('Cats API (e2e)', () => {
  let app: INestApplication;

  const api = () => request(app.getHttpServer());

  const createCat = async (body: Record<string, unknown>): Promise<CatDetail> => {
    const response = await api().post('/api/cats/').send(body).expect(201);
    return response.body.cat;
  };

  const createTrio = async () => {
    const whiskers = await createCat({ name: 'Whiskers', breed: 'Persian', age: 3 });
    const mittens = await createCat({ name: 'Mittens', breed: 'Siamese', age: 2 });
    const shadow = await createCat({
      name: 'Shadow',
      breed: 'Persian',
      age: 1,
      owner_name: 'Alice',
      adoption_date: '2020-05-01',
    });
    return { whiskers, mittens, shadow };
  };

  beforeAll(async () => {
    process.env.DATABASE_TYPE = 'sqljs';
    process.env.DATABASE_NAME = ':memory:';

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  beforeEach(async () => {
    await app.get(DataSource).getRepository(Cat).clear();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/cats/', () => {
    it('creates a cat and returns its full record', async () => {
      const response = await api()
        .post('/api/cats/')
        .send({
          name: 'fluffy',
          breed: 'persian',
          age: 3,
          color: 'white',
          weight: 4.2,
          is_neutered: true,
          description: 'A friendly and calm cat',
        })
        .expect(201);

      expect(response.body).toEqual({
        status: 'success',
        message: 'Cat "Fluffy" has been successfully added to the database',
        cat: {
          id: expect.any(Number),
          name: 'Fluffy',
          breed: 'Persian',
          age: 3,
          color: 'White',
          weight: '4.20',
          is_neutered: true,
          owner_name: null,
          adoption_date: null,
          description: 'A friendly and calm cat',
          created_at: expect.any(String),
          is_adopted: false,
          age_display: '3 years old',
          weight_display: '4.20 kg',
          status_display: 'Available for adoption',
        },
      });
    });

    it('ignores read-only fields', async () => {
      const cat = await createCat({ name: 'Pixel', id: 999, is_adopted: true });

      expect(cat.id).not.toBe(999);
      expect(cat.is_adopted).toBe(false);
    });

    it('returns every domain error at once', async () => {
      const response = await api()
        .post('/api/cats/')
        .send({ name: 'K', age: 31, weight: 0 })
        .expect(400);

      expect(response.body).toEqual({
        status: 'error',
        message: 'Invalid data provided',
        errors: {
          name: ['Cat name must be at least 2 characters long'],
          age: ['Age seems unrealistic for a cat'],
          weight: ['Weight must be positive'],
        },
      });
    });

    it('rejects values of the wrong type', async () => {
      const response = await api()
        .post('/api/cats/')
        .send({ name: 'Kit', age: 'three', adoption_date: '03/05/2024' })
        .expect(400);

      expect(response.body.status).toBe('error');
      expect(response.body.errors.age).toEqual(['age must be an integer number']);
      expect(response.body.errors.adoption_date).toContain(
        'adoption_date must be a date in YYYY-MM-DD format',
      );
    });

    it('rejects a duplicate name ignoring case', async () => {
      await createCat({ name: 'Whiskers' });

      const response = await api().post('/api/cats/').send({ name: 'WHISKERS' }).expect(400);

      expect(response.body.errors).toEqual({
        name: [
          "A cat with the name 'Whiskers' already exists. Please choose a different name.",
        ],
      });
    });

    it('rejects half of the adoption pair', async () => {
      const response = await api()
        .post('/api/cats/')
        .send({ name: 'Kit', owner_name: 'Alice' })
        .expect(400);

      expect(response.body.errors).toEqual({
        non_field_errors: ['Cats with owners must have an adoption date'],
      });
    });
  });

  describe('GET /api/cats/', () => {
    it('lists cats in id order with the list projection', async () => {
      const { whiskers } = await createTrio();

      const response = await api().get('/api/cats/').expect(200);

      expect(response.body.map((cat: { name: string }) => cat.name)).toEqual([
        'Whiskers',
        'Mittens',
        'Shadow',
      ]);
      expect(response.body[0]).toEqual({
        id: whiskers.id,
        name: 'Whiskers',
        breed: 'Persian',
        age: 3,
        color: null,
        is_adopted: false,
        status_display: 'Available for adoption',
        created_at: whiskers.created_at,
      });
    });

    it('applies query filters and ignores malformed numbers', async () => {
      await createTrio();

      const ages = await api().get('/api/cats/?min_age=2&max_age=3').expect(200);
      const lenient = await api().get('/api/cats/?min_age=abc&status=adopted').expect(200);
      const ordered = await api().get('/api/cats/?ordering=-name').expect(200);

      expect(ages.body.map((cat: { name: string }) => cat.name)).toEqual(['Whiskers', 'Mittens']);
      expect(lenient.body.map((cat: { name: string }) => cat.name)).toEqual(['Shadow']);
      expect(ordered.body.map((cat: { name: string }) => cat.name)).toEqual([
        'Whiskers',
        'Shadow',
        'Mittens',
      ]);
    });
  });

  describe('GET /api/cats/:id/', () => {
    it('returns the full record', async () => {
      const { shadow } = await createTrio();

      const response = await api().get(`/api/cats/${shadow.id}/`).expect(200);

      expect(response.body).toEqual(shadow);
      expect(response.body.status_display).toBe('Adopted by Alice');
    });

    it('returns 404 for unknown or malformed ids', async () => {
      const missing = await api().get('/api/cats/4242/').expect(404);
      const malformed = await api().get('/api/cats/not-a-number/').expect(404);

      expect(missing.body).toEqual({ status: 'error', message: 'Cat with ID 4242 not found' });
      expect(malformed.body).toEqual({
        status: 'error',
        message: 'Cat with ID not-a-number not found',
      });
    });
  });

  describe('PUT and PATCH /api/cats/:id/', () => {
    it('replaces fields with PUT', async () => {
      const { whiskers } = await createTrio();

      const response = await api()
        .put(`/api/cats/${whiskers.id}/`)
        .send({ name: 'whiskers', breed: 'himalayan', weight: 20 })
        .expect(200);

      expect(response.body).toMatchObject({
        id: whiskers.id,
        name: 'Whiskers',
        breed: 'Himalayan',
        age: 3,
        weight: '20.00',
      });
    });

    it('requires a name with PUT but not with PATCH', async () => {
      const { mittens } = await createTrio();

      await api().put(`/api/cats/${mittens.id}/`).send({ age: 4 }).expect(400);
      const response = await api().patch(`/api/cats/${mittens.id}/`).send({ age: 4 }).expect(200);

      expect(response.body).toMatchObject({ name: 'Mittens', age: 4 });
    });

    it('rejects a weight above 20', async () => {
      const { mittens } = await createTrio();

      const response = await api()
        .patch(`/api/cats/${mittens.id}/`)
        .send({ weight: 20.01 })
        .expect(400);

      expect(response.body.errors).toEqual({ weight: ['Weight seems unrealistic for a cat'] });
    });
  });

  describe('DELETE /api/cats/:id/', () => {
    it('deletes once and then reports 404', async () => {
      const { mittens } = await createTrio();

      await api().delete(`/api/cats/${mittens.id}/`).expect(204);
      await api().delete(`/api/cats/${mittens.id}/`).expect(404);
    });
  });

  describe('adoption', () => {
    it('adopts and returns a cat', async () => {
      const { whiskers } = await createTrio();

      const adopted = await api()
        .post(`/api/cats/${whiskers.id}/adopt/`)
        .send({ owner_name: 'john doe', adoption_date: '2024-03-01' })
        .expect(200);

      expect(adopted.body.message).toBe('Whiskers has been successfully adopted by John Doe!');
      expect(adopted.body.cat).toMatchObject({
        owner_name: 'John Doe',
        adoption_date: '2024-03-01',
        is_adopted: true,
        status_display: 'Adopted by John Doe',
      });

      const returned = await api().post(`/api/cats/${whiskers.id}/return_to_shelter/`).expect(200);

      expect(returned.body.message).toBe('Whiskers has been returned to the shelter');
      expect(returned.body.former_owner).toBe('John Doe');
      expect(returned.body.cat).toEqual(whiskers);
    });

    it('refuses to adopt an adopted cat', async () => {
      const { shadow } = await createTrio();

      const response = await api()
        .post(`/api/cats/${shadow.id}/adopt/`)
        .send({ owner_name: 'Bob' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Shadow has already been adopted by Alice' });
    });

    it('refuses an owner name that is too short', async () => {
      const { whiskers } = await createTrio();

      const response = await api()
        .post(`/api/cats/${whiskers.id}/adopt/`)
        .send({ owner_name: 'B' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Owner name must be at least 2 characters long' });
    });

    it('refuses an adoption without an owner name', async () => {
      const { whiskers } = await createTrio();

      const response = await api().post(`/api/cats/${whiskers.id}/adopt/`).send({}).expect(400);

      expect(response.body).toEqual({ error: 'Owner name cannot be empty' });
    });

    it('refuses an adoption date that is not a calendar date', async () => {
      const { whiskers } = await createTrio();

      const response = await api()
        .post(`/api/cats/${whiskers.id}/adopt/`)
        .send({ owner_name: 'Bob', adoption_date: '2024-02-30' })
        .expect(400);

      expect(response.body).toEqual({
        error: 'adoption_date must be a valid ISO 8601 date string',
      });
      const unchanged = await api().get(`/api/cats/${whiskers.id}/`).expect(200);
      expect(unchanged.body.is_adopted).toBe(false);
    });

    it('refuses to return an available cat', async () => {
      const { mittens } = await createTrio();

      const response = await api()
        .post(`/api/cats/${mittens.id}/return_to_shelter/`)
        .expect(400);

      expect(response.body).toEqual({ error: 'Mittens is not currently adopted' });
    });

    it('lists available and adopted cats separately', async () => {
      await createTrio();

      const available = await api().get('/api/cats/available/').expect(200);
      const adopted = await api().get('/api/cats/adopted/').expect(200);

      expect(available.body.map((cat: { name: string }) => cat.name)).toEqual([
        'Whiskers',
        'Mittens',
      ]);
      expect(adopted.body.map((cat: { name: string }) => cat.name)).toEqual(['Shadow']);
    });
  });

  describe('reports', () => {
    it('returns shelter statistics', async () => {
      await createTrio();

      const response = await api().get('/api/cats/statistics/').expect(200);

      expect(response.body).toEqual({
        total_cats: 3,
        adopted_cats: 1,
        available_cats: 2,
        adoption_rate: 33.33,
        average_age: 2,
        youngest_age: 1,
        oldest_age: 3,
        neutered_cats: 0,
        breeds_count: 2,
        recent_adoptions: 0,
      });
    });

    it('returns breed statistics', async () => {
      await createTrio();

      const response = await api().get('/api/cats/breeds/').expect(200);

      expect(response.body).toEqual([
        { breed: 'Persian', count: 2, adoption_rate: 50, average_age: 2, average_weight: null },
        { breed: 'Siamese', count: 1, adoption_rate: 0, average_age: 2, average_weight: null },
      ]);
    });

    it('searches with a count and results', async () => {
      await createTrio();

      const response = await api().get('/api/cats/search/?name=wHi&available=true').expect(200);

      expect(response.body.count).toBe(1);
      expect(response.body.results.map((cat: { name: string }) => cat.name)).toEqual([
        'Whiskers',
      ]);
    });
  });
});
