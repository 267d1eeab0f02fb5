import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, appConfig } from './env';
import { CLOCK, systemClock } from '../common/clock';

@Global()
@Module({
  providers: [
    { provide: APP_CONFIG, useFactory: appConfig },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [APP_CONFIG, CLOCK],
})
export class ConfigModule { }
