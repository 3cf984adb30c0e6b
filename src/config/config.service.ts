import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor() {
    this.envConfig = this.load();
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOrDefault(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.envConfig[key];
    if (raw === undefined) return fallback;
    return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
  }

  private load(): Record<string, string> {
    // Try to load from .env file first
    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    try {
      return dotenv.parse(fs.readFileSync(envFile));
    } catch {
      this.logger.warn(`Failed to load ${envFile}, using process.env`);
      return Object.fromEntries(
        Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
      );
    }
  }
}
