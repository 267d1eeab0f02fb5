import { Logger, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { APP_CONFIG, type AppConfig } from '../config/env';
import { Customer } from '../customers/entities/customer.entity';
import { RefreshTokenEntity } from '../refresh-tokens/entities/refresh-token.entity';

@Module({
    imports: [
        TypeOrmModule.forRootAsync({
            inject: [APP_CONFIG],
            useFactory: (config: AppConfig) => {
                new Logger(DatabaseModule.name).log(`environment is ${config.nodeEnv} in connecting to DB.`)
                return ({
                    type: 'mariadb',
                    host: config.database.host,
                    port: config.database.port,
                    username: config.database.username,
                    password: config.database.password,
                    database: config.database.database,
                    entities: [Customer, RefreshTokenEntity],
                    synchronize: config.nodeEnv !== 'production',
                })
            }
        })
    ],
    exports: [TypeOrmModule],
})
export class DatabaseModule { }
