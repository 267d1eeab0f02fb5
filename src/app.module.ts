import { Module } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { AuthModule } from './auth/auth.module';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AllExceptionFilter } from './exceptions/all-exceptions.filter';
import { validationPipe } from './common/validation.pipe';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,  // <- configure DB first
    AuthModule,
  ],
  providers: [
    { provide: APP_PIPE, useFactory: validationPipe },
    { provide: APP_FILTER, useClass: AllExceptionFilter },
  ],
})
export class AppModule { }
