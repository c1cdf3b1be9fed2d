import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

/**
 * Environment variable loading (.env.local, then .env) and typed access.
 */
export class EnvLoader {
  private static loadedFrom: string[] | null = null;

  /**
   * Load dotenv files from `cwd` once. Existing variables are never overridden, so
   * `.env.local` wins over `.env` and the real environment wins over both.
   */
  public static initialize(cwd: string = process.cwd()): string[] {
    if (this.loadedFrom) {
      return this.loadedFrom;
    }

    const loaded: string[] = [];
    for (const file of ['.env.local', '.env']) {
      const envPath = path.join(cwd, file);
      if (!fs.existsSync(envPath)) {
        continue;
      }
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw result.error;
      }
      loaded.push(envPath);
    }

    this.loadedFrom = loaded;
    return loaded;
  }
}

/**
 * Typed reads over an environment map. Invalid numbers come back as NaN so that
 * configuration validation reports them.
 */
export class EnvReader {
  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    const value = this.source[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  getNumber(key: string): number | undefined {
    const value = this.get(key);
    return value === undefined ? undefined : Number(value);
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  }

  getArray(key: string): string[] | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return undefined;
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
}
