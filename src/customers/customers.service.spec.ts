import { ConflictException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { QueryFailedError } from 'typeorm';
import { CustomersService } from './customers.service';
import { Customer } from './entities/customer.entity';

describe('CustomersService', () => {
  // bcrypt cost 12 in pure JS
  jest.setTimeout(20_000);

  let service: CustomersService;
  const rows: Customer[] = [];
  const repo = {
    findOne: jest.fn(async ({ where }: { where: Partial<Customer> }) =>
      rows.find((r) => (where.id === undefined || r.id === where.id) && (where.email === undefined || r.email === where.email)) ?? null,
    ),
    create: jest.fn((input: Partial<Customer>) => Object.assign(new Customer(), input)),
    save: jest.fn(async (customer: Customer) => {
      customer.id = String(rows.length + 1);
      rows.push(customer);
      return customer;
    }),
  };

  beforeEach(async () => {
    rows.length = 0;
    const module = await Test.createTestingModule({
      providers: [CustomersService, { provide: getRepositoryToken(Customer), useValue: repo }],
    }).compile();

    service = module.get(CustomersService);
  });

  it('registers with a normalized email, a bcrypt hash and the default role', async () => {
    const profile = await service.register({ name: ' Ada ', email: 'Ada@Example.TEST ', password: 'password1' });

    expect(profile).toEqual({ id: '1', name: 'Ada', email: 'ada@example.test', roles: ['ROLE_USER'] });
    expect(rows[0].passwordHash).not.toBe('password1');
    expect(await bcrypt.compare('password1', rows[0].passwordHash)).toBe(true);
  });

  it('refuses a duplicate email', async () => {
    await service.register({ name: 'Ada', email: 'ada@example.test', password: 'password1' });

    await expect(service.register({ name: 'Ada', email: 'ADA@example.test', password: 'password1' })).rejects.toBeInstanceOf(
      ConflictException,
    );
  });

  it('reports a duplicate caught by the unique index as a conflict', async () => {
    const duplicate = Object.assign(new Error("Duplicate entry 'ada@example.test'"), { code: 'ER_DUP_ENTRY' });
    repo.save.mockRejectedValueOnce(new QueryFailedError('INSERT INTO `customers`', [], duplicate));

    await expect(service.register({ name: 'Ada', email: 'ada@example.test', password: 'password1' })).rejects.toThrow(
      new ConflictException('Email already in use'),
    );
  });

  it('passes other insert failures through', async () => {
    repo.save.mockRejectedValueOnce(new QueryFailedError('INSERT INTO `customers`', [], new Error('Lock wait timeout')));

    await expect(service.register({ name: 'Ada', email: 'ada@example.test', password: 'password1' })).rejects.toBeInstanceOf(
      QueryFailedError,
    );
  });

  it('verifies credentials', async () => {
    await service.register({ name: 'Ada', email: 'ada@example.test', password: 'password1' });

    expect(await service.verifyCredentials('ada@example.test', 'password1')).toMatchObject({ id: '1' });
    expect(await service.verifyCredentials('ada@example.test', 'wrong-pass1')).toBeNull();
    expect(await service.verifyCredentials('nobody@example.test', 'password1')).toBeNull();
  });

  it('finds profiles by id', async () => {
    await service.register({ name: 'Ada', email: 'ada@example.test', password: 'password1' });

    expect(await service.findProfile('1')).toMatchObject({ name: 'Ada' });
    expect(await service.findProfile('2')).toBeNull();
  });
});
