import { describe, test, expect } from '@jest/globals';
import { SheetError, classifyRemoteError, isSheetError, remoteMessage, remoteStatus, toSheetError } from '../../src/errors.js';
import { FakeApiError } from '../helpers/fake-spreadsheet.js';

describe('classifyRemoteError', () => {
  test.each([
    [401, 'AuthenticationFailure'],
    [403, 'AuthenticationFailure'],
    [404, 'NotFound'],
    [429, 'RemoteFailure'],
    [500, 'RemoteFailure']
  ])('status %i is %s', (status, kind) => {
    expect(classifyRemoteError(new FakeApiError(status, 'boom'))).toBe(kind);
  });

  test('OAuth token errors are authentication failures', () => {
    const error = { response: { status: 400, data: { error: 'invalid_grant', error_description: 'Invalid JWT Signature.' } } };
    expect(classifyRemoteError(error)).toBe('AuthenticationFailure');
  });

  test('unparsable ranges are invalid addresses', () => {
    expect(classifyRemoteError(new FakeApiError(400, 'Unable to parse range: Foo!!A1'))).toBe('InvalidAddress');
  });

  test('ranges past the grid are invalid addresses', () => {
    const error = new FakeApiError(400, "Range ('Sheet1'!A1:A2000) exceeds grid limits. Max rows: 1000, max columns: 26");
    expect(classifyRemoteError(error)).toBe('InvalidAddress');
  });

  test('other bad requests are remote failures', () => {
    expect(classifyRemoteError(new FakeApiError(400, 'Invalid value at data'))).toBe('RemoteFailure');
  });

  test('errors without a response are remote failures', () => {
    expect(classifyRemoteError(new Error('socket hang up'))).toBe('RemoteFailure');
  });
});

describe('remote error details', () => {
  test('reads the status from the response or the error', () => {
    expect(remoteStatus(new FakeApiError(503, 'unavailable'))).toBe(503);
    expect(remoteStatus({ status: 429 })).toBe(429);
    expect(remoteStatus(new Error('x'))).toBeUndefined();
  });

  test('prefers the API message over the transport message', () => {
    expect(remoteMessage(new FakeApiError(500, 'Internal error encountered.'))).toBe('Internal error encountered.');
    expect(remoteMessage({ response: { data: { error: 'invalid_grant', error_description: 'Bad key' } } })).toBe('Bad key');
    expect(remoteMessage(new Error('ECONNRESET'))).toBe('ECONNRESET');
    expect(remoteMessage('plain')).toBe('plain');
  });
});

describe('toSheetError', () => {
  test('attributes the failure to the operation and target', () => {
    const cause = new FakeApiError(429, 'Quota exceeded');
    const error = toSheetError(cause, 'getRange', 'A1:B2');

    expect(isSheetError(error)).toBe(true);
    expect(error.kind).toBe('RemoteFailure');
    expect(error.operation).toBe('getRange');
    expect(error.target).toBe('A1:B2');
    expect(error.status).toBe(429);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('getRange failed for A1:B2: Quota exceeded');
  });

  test('omits the target when there is none', () => {
    expect(toSheetError(new Error('offline'), 'clear').message).toBe('clear failed: offline');
  });

  test('passes a SheetError through unchanged', () => {
    const original = new SheetError('NotFound', 'worksheet does not exist', { operation: 'setSheet', target: 'Nope' });
    expect(toSheetError(original, 'dbAddValue')).toBe(original);
  });
});
