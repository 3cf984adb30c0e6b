import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { ConfigService } from '../config/config.service';
import { LIBRARY_ENTITIES } from './entities';

/**
 * Connection settings shared by the Nest application and the migration CLI.
 *
 * With DB_TRUSTED_AUTH=true no password is sent and the server's trust/peer
 * authentication decides access.
 */
export function buildTypeOrmOptions(configService: ConfigService): PostgresConnectionOptions {
  const trustedAuth = configService.getBoolean('DB_TRUSTED_AUTH', false);
  const nodeEnv = configService.getOrDefault('NODE_ENV', 'development');

  return {
    type: 'postgres',
    host: configService.getOrDefault('DB_HOST', 'localhost'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: trustedAuth ? undefined : configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: LIBRARY_ENTITIES,
    migrations: [__dirname + '/../migrations/*{.ts,.js}'],
    synchronize: configService.getBoolean('DB_SYNCHRONIZE', false),
    logging: nodeEnv === 'development',
    ssl: false,
  };
}
