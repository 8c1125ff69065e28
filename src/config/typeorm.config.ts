import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import configuration from './configuration';

config();

const appConfig = configuration();

/**
 * Data source used by the TypeORM CLI for migrations and by the seed scripts.
 */
export default new DataSource({
  type: 'postgres',
  host: appConfig.database.host,
  port: appConfig.database.port,
  username: appConfig.database.username,
  password: appConfig.database.password,
  database: appConfig.database.database,
  entities: [__dirname + '/../**/*.entity{.ts,.js}'],
  migrations: [__dirname + '/../database/migrations/*{.ts,.js}'],
  synchronize: false,
  logging: appConfig.nodeEnv === 'development',
});
