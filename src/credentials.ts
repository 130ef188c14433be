import { JWT } from 'google-auth-library';
import { readFile } from 'fs/promises';
import { SheetError, isRecord } from './errors.js';
import { CredentialsSource, ServiceAccountCredentials } from './types.js';

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function parseServiceAccount(content: unknown, source: string): ServiceAccountCredentials {
  if (!isRecord(content)) {
    throw new SheetError('AuthenticationFailure', 'service account must be a JSON object', {
      operation: 'loadCredentials',
      target: source
    });
  }

  const { client_email, private_key, project_id } = content;
  if (typeof client_email !== 'string' || typeof private_key !== 'string') {
    throw new SheetError('AuthenticationFailure', 'service account is missing client_email or private_key', {
      operation: 'loadCredentials',
      target: source
    });
  }

  return {
    client_email,
    private_key,
    ...(typeof project_id === 'string' ? { project_id } : {})
  };
}

export async function readServiceAccountFile(filePath: string): Promise<ServiceAccountCredentials> {
  let credsContent: string;
  try {
    credsContent = await readFile(filePath, 'utf8');
  } catch (error) {
    const detail = hasCode(error, 'ENOENT') ? 'credentials file not found' : String(error);
    throw new SheetError('AuthenticationFailure', detail, {
      operation: 'loadCredentials',
      target: filePath,
      cause: error
    });
  }

  let creds: unknown;
  try {
    creds = JSON.parse(credsContent);
  } catch (error) {
    throw new SheetError('AuthenticationFailure', 'credentials file is not valid JSON', {
      operation: 'loadCredentials',
      target: filePath,
      cause: error
    });
  }

  return parseServiceAccount(creds, filePath);
}

export async function loadServiceAccount(source: CredentialsSource): Promise<ServiceAccountCredentials> {
  if (typeof source === 'string') {
    return readServiceAccountFile(source);
  }
  return parseServiceAccount(source, source.client_email);
}

export function createJwt(creds: ServiceAccountCredentials): JWT {
  return new JWT({
    email: creds.client_email,
    key: creds.private_key,
    scopes: SHEETS_SCOPES
  });
}
