// ============================================================================
// Tests: Review API Client
// ============================================================================

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { extractErrorMessage, ReviewApiClient } from '../api-client.js';
import { ReviewApiError } from '../errors.js';

const mockFetch = vi.fn();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

function jsonResponse(body: unknown, status = 200) {
  return { ok: status < 300, status, text: async () => JSON.stringify(body) };
}

const client = new ReviewApiClient('http://review-api.test/');

describe('ReviewApiClient', () => {
  test('getContacts GETs the encoded session path', async () => {
    const body = { sessionId: 's 1', totalContacts: 0, contacts: [] };
    mockFetch.mockResolvedValueOnce(jsonResponse(body));

    await expect(client.getContacts('s 1')).resolves.toEqual(body);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://review-api.test/contacts/s%201');
    expect(init.method).toBe('GET');
  });

  test('reviewContact POSTs the JSON body', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ processed: true }));
    const body = { sessionId: 'session-1', contactIndex: 2, addToMailingList: false, addToCrm: true };

    await client.reviewContact(body);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://review-api.test/review-contact');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(init.body)).toEqual(body);
  });

  test('uploadCsv sends the bytes as the multipart "file" field', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ sessionId: 'session-1' }));

    await client.uploadCsv('contacts.csv', Buffer.from('a,b'));

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://review-api.test/upload-csv');
    expect(init.body).toBeInstanceOf(FormData);
    const file = init.body.get('file');
    expect(file.name).toBe('contacts.csv');
    expect(await file.text()).toBe('a,b');
  });

  test('throws ReviewApiError with the API error message', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Review session not found' }, 404));

    const attempt = client.getContacts('gone');

    await expect(attempt).rejects.toBeInstanceOf(ReviewApiError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 404, message: 'Review session not found' });
  });
});

describe('extractErrorMessage', () => {
  test('prefers the JSON error field', () => {
    expect(extractErrorMessage('{"error":"File must be a CSV","kind":"x"}', 400)).toBe('File must be a CSV');
  });

  test('falls back to the raw text', () => {
    expect(extractErrorMessage('Bad Gateway', 502)).toBe('Bad Gateway');
    expect(extractErrorMessage('{"detail":"nope"}', 400)).toBe('{"detail":"nope"}');
  });

  test('falls back to the status for an empty body', () => {
    expect(extractErrorMessage('', 503)).toBe('HTTP 503');
  });
});
