import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export type EnvSource = Record<string, string | undefined>;

/**
 * Environment variable reader
 */
export class EnvLoader {
  private static initialized = false;

  constructor(private readonly source: EnvSource = process.env) {}

  /**
   * Load .env files into process.env once. Existing variables win.
   */
  public static initialize(cwd: string = process.cwd()): void {
    if (this.initialized) {
      return;
    }

    const envPaths = [path.join(cwd, '.env.local'), path.join(cwd, '.env')];

    for (const envPath of envPaths) {
      if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
      }
    }

    this.initialized = true;
  }

  /**
   * Raw value; empty strings count as unset
   */
  public get(key: string, defaultValue?: string): string | undefined {
    const value = this.source[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  public getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = parseFloat(value);
    return isNaN(num) ? defaultValue : num;
  }

  public getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const lowerValue = value.toLowerCase();
    return lowerValue === 'true' || lowerValue === '1' || lowerValue === 'yes';
  }
}
