import { createLogger } from '../../src/logger.js';
import { SheetClient } from '../../src/sheet-client.js';
import { SheetClientOptions } from '../../src/types.js';
import { FakeSpreadsheet } from './fake-spreadsheet.js';

export const TEST_CREDENTIALS = {
  client_email: 'test@test-project.iam.gserviceaccount.com',
  private_key: 'test-secret'
};

export function createTestClient(doc: FakeSpreadsheet, options: Partial<SheetClientOptions> = {}): SheetClient {
  return new SheetClient({
    spreadsheetId: doc.spreadsheetId,
    credentials: TEST_CREDENTIALS,
    logger: createLogger({ silent: true }),
    createDocument: () => doc,
    ...options
  });
}

export async function connectTestClient(
  doc: FakeSpreadsheet,
  options: Partial<SheetClientOptions> = {}
): Promise<SheetClient> {
  const client = createTestClient(doc, options);
  await client.initialize();
  return client;
}
