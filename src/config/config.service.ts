import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(overrides?: Record<string, string>) {
    if (overrides) {
      this.envConfig = { ...overrides };
      return;
    }

    // Try to load from .env file first
    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    try {
      this.envConfig = dotenv.parse(fs.readFileSync(envFile));
    } catch (err) {
      this.logger.warn(`Failed to load ${envFile}, using process.env`);
      this.envConfig = Object.fromEntries(
        Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
      );
    }
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOptional(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new Error(`Configuration error: ${key} must be a number, got '${raw}'`);
    }
    return value;
  }

  // comma separated, blanks dropped
  getList(key: string): string[] {
    const raw = this.envConfig[key];
    if (!raw) return [];
    return raw.split(',').map((s) => s.trim()).filter(Boolean);
  }
}
