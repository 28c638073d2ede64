import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Logger } from '@nestjs/common';

// Provided through ConfigModule's factory
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const envFile = env.NODE_ENV === 'production'
      ? '.env.production'
      : `.env.${env.NODE_ENV || 'development'}`;

    let fileConfig: Record<string, string> = {};
    try {
      fileConfig = dotenv.parse(fs.readFileSync(envFile));
    } catch (err) {
      this.logger.warn(`Failed to load ${envFile}, using process.env`);
    }

    // Values exported in the environment win over the env file
    const fromEnv = Object.fromEntries(
      Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
    this.envConfig = { ...fileConfig, ...fromEnv };
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
    const parsed = Number.parseInt(this.envConfig[key] ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.envConfig[key];
    if (raw === undefined) return fallback;
    return raw.toLowerCase() === 'true';
  }

  get isProduction(): boolean {
    return this.getOrDefault('NODE_ENV', 'development') === 'production';
  }
}
