import 'reflect-metadata';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { AllExceptionsFilter } from '../src/shared/filters/all-exceptions.filter';
import { InteractionKind } from '../src/customer/domain/enums/interaction-kind.enum';

describe('Customer Interaction Register (e2e)', () => {
  let app: INestApplication;
  let dataDir: string;

  const anna = {
    firstName: 'Anna',
    lastName: 'Rossi',
    email: 'anna@example.it',
    phone: '000',
    address: 'Via Roma',
    taxCode: 'RSSANN80A01H501Z',
    birthDate: '01/01/1980',
  };

  const checkup = {
    date: '01/06/2024',
    time: '10:00',
    kind: InteractionKind.APPOINTMENT,
    description: 'Checkup',
    agent: 'Luigi',
    outcome: 'Booked',
  };

  beforeAll(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'customer-e2e-'));
    process.env.CRM_DATA_DIR = dataDir;

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
        forbidNonWhitelisted: true,
      }),
    );
    app.useGlobalFilters(new AllExceptionsFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    await rm(dataDir, { recursive: true, force: true });
    delete process.env.CRM_DATA_DIR;
  });

  describe('POST /customers', () => {
    it('should register a customer', async () => {
      const res = await request(app.getHttpServer())
        .post('/customers')
        .send(anna)
        .expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.data.position).toBe(0);
      expect(res.body.data.fullName).toBe('Anna Rossi');
      expect(res.body.data.interactions).toEqual([]);
    });

    it('should return 409 for a tax code already registered', async () => {
      const res = await request(app.getHttpServer())
        .post('/customers')
        .send({ ...anna, firstName: 'Other' })
        .expect(409);

      expect(res.body.success).toBe(false);
      expect(res.body.error.message).toBe(
        "Customer with tax code 'RSSANN80A01H501Z' already exists",
      );
    });

    it('should return 400 when a field contains the separator', async () => {
      const res = await request(app.getHttpServer())
        .post('/customers')
        .send({ taxCode: 'PIPE1', firstName: 'An|na' })
        .expect(400);

      expect(res.body.error.message).toBe('Validation failed');
    });

    it('should return 400 when the tax code is missing', async () => {
      await request(app.getHttpServer())
        .post('/customers')
        .send({ firstName: 'Nobody' })
        .expect(400);
    });
  });

  describe('interactions', () => {
    it('should record interactions at increasing positions', async () => {
      const first = await request(app.getHttpServer())
        .post(`/customers/${anna.taxCode}/interactions`)
        .send(checkup)
        .expect(201);
      const second = await request(app.getHttpServer())
        .post(`/customers/${anna.taxCode}/interactions`)
        .send({ ...checkup, kind: InteractionKind.CALL, description: 'Reminder' })
        .expect(201);

      expect(first.body.data.position).toBe(0);
      expect(first.body.data.kind).toBe('Appointment');
      expect(second.body.data.position).toBe(1);
    });

    it('should return 400 for a badly formatted date', async () => {
      await request(app.getHttpServer())
        .post(`/customers/${anna.taxCode}/interactions`)
        .send({ ...checkup, date: '2024-06-01' })
        .expect(400);
    });

    it('should return 404 for an unknown customer', async () => {
      const res = await request(app.getHttpServer())
        .post('/customers/UNKNOWN/interactions')
        .send(checkup)
        .expect(404);

      expect(res.body.error.message).toBe(
        "Customer with tax code 'UNKNOWN' not found",
      );
    });

    it('should find interactions across customers', async () => {
      const res = await request(app.getHttpServer())
        .get('/interactions/search')
        .query({ q: 'remind' })
        .expect(200);

      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].taxCode).toBe(anna.taxCode);
      expect(res.body.data[0].customerName).toBe('Anna Rossi');
      expect(res.body.data[0].interaction.position).toBe(1);
    });
  });

  describe('GET /customers', () => {
    it('should find customers case-insensitively', async () => {
      const res = await request(app.getHttpServer())
        .get('/customers/search')
        .query({ q: 'ROSSI' })
        .expect(200);

      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].interactionCount).toBe(2);
    });

    it('should look up a customer by exact name', async () => {
      const res = await request(app.getHttpServer())
        .get('/customers/lookup')
        .query({ firstName: 'Anna', lastName: 'Rossi' })
        .expect(200);

      expect(res.body.data.taxCode).toBe(anna.taxCode);
    });

    it('should return 404 when no customer has the name', async () => {
      await request(app.getHttpServer())
        .get('/customers/lookup')
        .query({ firstName: 'anna', lastName: 'rossi' })
        .expect(404);
    });

    it('should apply only non-empty fields on update', async () => {
      const res = await request(app.getHttpServer())
        .patch(`/customers/${anna.taxCode}`)
        .send({ phone: '111', email: '' })
        .expect(200);

      expect(res.body.data.phone).toBe('111');
      expect(res.body.data.email).toBe('anna@example.it');
    });
  });

  describe('store', () => {
    it('should write both data files', async () => {
      const res = await request(app.getHttpServer())
        .post('/store/save')
        .expect(200);

      expect(res.body.data).toEqual({ customers: 1, interactions: 2 });
      expect(await readFile(join(dataDir, 'customers.txt'), 'utf8')).toBe(
        'Anna|Rossi|anna@example.it|111|Via Roma|RSSANN80A01H501Z|01/01/1980\n',
      );
      expect(await readFile(join(dataDir, 'interactions.txt'), 'utf8')).toBe(
        'RSSANN80A01H501Z|01/06/2024|10:00|Appointment|Checkup|Luigi|Booked\n' +
          'RSSANN80A01H501Z|01/06/2024|10:00|Call|Reminder|Luigi|Booked\n',
      );
    });

    it('should replace the store with the saved files on load', async () => {
      await request(app.getHttpServer())
        .post('/customers')
        .send({ taxCode: 'TEMP1', firstName: 'Temp' })
        .expect(201);

      const res = await request(app.getHttpServer())
        .post('/store/load')
        .expect(200);

      expect(res.body.data).toEqual({ loaded: true, customers: 1 });
      await request(app.getHttpServer()).get('/customers/TEMP1').expect(404);
    });
  });

  describe('removal', () => {
    it('should shift later interactions down after a removal', async () => {
      const removed = await request(app.getHttpServer())
        .delete(`/customers/${anna.taxCode}/interactions/0`)
        .expect(200);
      const remaining = await request(app.getHttpServer())
        .get(`/customers/${anna.taxCode}/interactions`)
        .expect(200);

      expect(removed.body.data.description).toBe('Checkup');
      expect(remaining.body.data).toHaveLength(1);
      expect(remaining.body.data[0].position).toBe(0);
      expect(remaining.body.data[0].description).toBe('Reminder');
    });

    it('should return 404 for a position past the end', async () => {
      await request(app.getHttpServer())
        .delete(`/customers/${anna.taxCode}/interactions/5`)
        .expect(404);
    });

    it('should remove a customer with its interactions', async () => {
      await request(app.getHttpServer())
        .delete(`/customers/${anna.taxCode}`)
        .expect(200);

      await request(app.getHttpServer())
        .get(`/customers/${anna.taxCode}`)
        .expect(404);
      const search = await request(app.getHttpServer())
        .get('/interactions/search')
        .query({ q: 'Reminder' })
        .expect(200);
      expect(search.body.data).toEqual([]);
    });
  });

  describe('GET /health', () => {
    it('should report the store and data directory as up', async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body.status).toBe('ok');
      expect(res.body.info['customer-store']).toEqual({
        status: 'up',
        customers: 0,
      });
      expect(res.body.info['data-dir']).toEqual({ status: 'up' });
    });
  });
});
