import Dotenv from 'dotenv';
import { readFileSync } from 'fs';
import path from 'path';
import { SheetsConfig } from './types.js';

export const DEFAULT_CREDENTIALS_PATH = './service-account.json';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** read with dotenv into `env`; variables already set win */
  envFile?: string;
  overrides?: Partial<SheetsConfig>;
}

export function resolveCredentialsPath(explicit: string | undefined, env: NodeJS.ProcessEnv): string {
  if (explicit) {
    return path.resolve(explicit);
  }
  if (env.GOOGLE_APPLICATION_CREDENTIALS) {
    return path.resolve(env.GOOGLE_APPLICATION_CREDENTIALS);
  }
  return path.resolve(DEFAULT_CREDENTIALS_PATH);
}

export function loadConfig(options: LoadConfigOptions = {}): SheetsConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  if (options.envFile) {
    const parsed = Dotenv.parse(readFileSync(options.envFile, 'utf8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
  }

  const spreadsheetId = overrides.spreadsheetId ?? env.SHEETS_SPREADSHEET_ID;
  if (!spreadsheetId) {
    throw new Error('SHEETS_SPREADSHEET_ID must be set');
  }

  const sheetName = overrides.sheetName ?? env.SHEETS_SHEET_NAME;
  const logFilePath = overrides.logFilePath ?? env.SHEETS_LOG_FILE;

  return {
    spreadsheetId,
    credentials: resolveCredentialsPath(overrides.credentials, env),
    logLevel: overrides.logLevel ?? env.SHEETS_LOG_LEVEL ?? 'info',
    ...(sheetName ? { sheetName } : {}),
    ...(logFilePath ? { logFilePath: path.resolve(logFilePath) } : {})
  };
}
