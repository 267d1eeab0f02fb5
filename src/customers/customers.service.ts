import { ConflictException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from "bcryptjs";
import { QueryFailedError, Repository } from 'typeorm';
import { DEFAULT_CUSTOMER_ROLE, type CustomerDirectory, type CustomerProfile, type NewCustomer } from './customer-directory';
import { Customer } from './entities/customer.entity';

const toProfile = (c: Customer): CustomerProfile => ({
  id: String(c.id),
  name: c.name,
  email: c.email,
  roles: c.roles ?? [],
});

// MySQL/MariaDB unique-index violation
const isDuplicateKey = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return typeof driverError === 'object' && driverError !== null && 'code' in driverError && driverError.code === 'ER_DUP_ENTRY';
};

@Injectable()
export class CustomersService implements CustomerDirectory {
  constructor(
    @InjectRepository(Customer)
    private customersRepository: Repository<Customer>
  ) { }

  async findProfile(customerRef: string) {
    const customer = await this.customersRepository.findOne({ where: { id: customerRef } });
    return customer ? toProfile(customer) : null;
  }

  async verifyCredentials(email: string, password: string) {
    const customer = await this.customersRepository.findOne({ where: { email: email.trim().toLowerCase() } });
    if (!customer) return null;
    const ok = await bcrypt.compare(password, customer.passwordHash);
    return ok ? toProfile(customer) : null;
  }

  async register({ name, email, password }: NewCustomer) {
    const normalized = email.trim().toLowerCase();
    const exists = await this.customersRepository.findOne({ where: { email: normalized } });
    if (exists) throw new ConflictException("Email already in use");

    const passwordHash = await bcrypt.hash(password, 12);
    const customer = this.customersRepository.create({
      name: name.trim(),
      email: normalized,
      passwordHash,
      roles: [DEFAULT_CUSTOMER_ROLE],
    });
    try {
      return toProfile(await this.customersRepository.save(customer));
    } catch (error) {
      // a concurrent registration won the unique index
      if (isDuplicateKey(error)) throw new ConflictException("Email already in use");
      throw error;
    }
  }
}
