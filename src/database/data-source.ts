import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { ENTITIES } from './entities';

export function dataSourceOptions(configService: ConfigService): DataSourceOptions {
  return {
    type: 'postgres',
    host: configService.getOrDefault('DB_HOST', 'localhost'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: ENTITIES,
    synchronize: configService.getBoolean('DB_SYNCHRONIZE', !configService.isProduction),
    logging: configService.getOrDefault('NODE_ENV', 'development') === 'development',
  };
}
