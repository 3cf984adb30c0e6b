import fs from 'fs';
import { Logger } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { LIBRARY_ENTITIES } from './entities';
import { buildTypeOrmOptions } from './typeorm-options';

describe('buildTypeOrmOptions', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  function configFrom(envFile: string): ConfigService {
    jest.spyOn(fs, 'readFileSync').mockReturnValue(envFile);
    return new ConfigService();
  }

  it('builds password authenticated Postgres options', () => {
    const options = buildTypeOrmOptions(
      configFrom('DB_USERNAME=library\nDB_PASSWORD=test-secret\nDB_DATABASE=library_test\n'),
    );

    expect(options).toMatchObject({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'library',
      password: 'test-secret',
      database: 'library_test',
      synchronize: false,
      logging: true,
      ssl: false,
    });
    expect(options.entities).toBe(LIBRARY_ENTITIES);
  });

  it('sends no password under trusted authentication', () => {
    const options = buildTypeOrmOptions(
      configFrom('NODE_ENV=production\nDB_HOST=db.internal\nDB_PORT=6543\nDB_USERNAME=library\nDB_DATABASE=library\nDB_TRUSTED_AUTH=true\n'),
    );

    expect(options.password).toBeUndefined();
    expect(options.host).toBe('db.internal');
    expect(options.port).toBe(6543);
    expect(options.logging).toBe(false);
  });

  it('requires the database name', () => {
    const config = configFrom('DB_USERNAME=library\nDB_PASSWORD=test-secret\n');

    expect(() => buildTypeOrmOptions(config)).toThrow(
      'Configuration error: Missing required environment variable DB_DATABASE',
    );
  });
});
