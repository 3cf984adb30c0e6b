// Used by the typeorm CLI (see the migration:* scripts)
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildTypeOrmOptions } from './typeorm-options';

export default new DataSource(buildTypeOrmOptions(new ConfigService()));
