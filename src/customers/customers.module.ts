import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CUSTOMER_DIRECTORY } from './customer-directory';
import { CustomersService } from './customers.service';
import { Customer } from './entities/customer.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Customer])],
  providers: [CustomersService, { provide: CUSTOMER_DIRECTORY, useExisting: CustomersService }],
  exports: [CUSTOMER_DIRECTORY],
})
export class CustomersModule { }
