// ============================================================================
// Tests: Mailing List Gateway
// ============================================================================
//
// Mocked fetch; credentials are passed explicitly so the environment is never read.

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { buildMailingListMember, createMailingListGateway, splitContactName } from '../mailing-list.js';
import type { MailingListConfig } from '../config.js';
import type { Contact } from '../../contacts/types.js';

const mockFetch = vi.fn();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

const config: MailingListConfig = {
  apiKey: 'test-mailing-key',
  listId: 'list-123',
  serverPrefix: 'us21',
  timeoutMs: 5000,
};

const ann: Contact = {
  name: 'Ann Lee',
  email: 'ann@x.com',
  linkedinUrl: 'https://linkedin.com/in/ann',
};

// ============================================================================
// Payload
// ============================================================================

describe('splitContactName', () => {
  test('splits on the first whitespace run', () => {
    expect(splitContactName({ ...ann, name: 'Mary Ann van Dyke' })).toEqual({
      firstName: 'Mary',
      lastName: 'Ann van Dyke',
    });
  });

  test('gives a single-token name an empty last name', () => {
    expect(splitContactName({ ...ann, name: 'Cher' })).toEqual({ firstName: 'Cher', lastName: '' });
  });

  test('keeps the last name empty for a single-token name even with a last_name column', () => {
    expect(splitContactName({ ...ann, name: 'Cher', lastName: 'Sarkisian' })).toEqual({
      firstName: 'Cher',
      lastName: '',
    });
    expect(buildMailingListMember({ ...ann, name: 'Cher', lastName: 'Sarkisian' }).merge_fields.LNAME).toBe('');
  });

  test('prefers explicit first and last name columns', () => {
    expect(splitContactName({ ...ann, name: 'Dr. Ann Lee', firstName: 'Ann', lastName: 'Lee' })).toEqual({
      firstName: 'Ann',
      lastName: 'Lee',
    });
  });

  test('falls back to the split for whichever part is missing', () => {
    expect(splitContactName({ ...ann, name: 'Ann Lee', lastName: 'Lee-Park' })).toEqual({
      firstName: 'Ann',
      lastName: 'Lee-Park',
    });
  });
});

describe('buildMailingListMember', () => {
  test('maps a contact to a subscribed audience member', () => {
    expect(buildMailingListMember(ann)).toEqual({
      email_address: 'ann@x.com',
      status: 'subscribed',
      merge_fields: {
        FNAME: 'Ann',
        LNAME: 'Lee',
        LINKEDIN: 'https://linkedin.com/in/ann',
      },
    });
  });
});

// ============================================================================
// Gateway
// ============================================================================

describe('createMailingListGateway', () => {
  test('posts the member to the audience endpoint with bearer auth', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });

    const outcome = await createMailingListGateway(config).enroll(ann);

    expect(outcome).toEqual({ ok: true, status: 200 });
    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://us21.api.mailchimp.com/3.0/lists/list-123/members');
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe('Bearer test-mailing-key');
    expect(init.headers['Content-Type']).toBe('application/json');
    expect(JSON.parse(init.body)).toEqual(buildMailingListMember(ann));
  });

  test('treats 201 as success', async () => {
    mockFetch.mockResolvedValueOnce({ status: 201 });

    await expect(createMailingListGateway(config).enroll(ann)).resolves.toEqual({ ok: true, status: 201 });
  });

  test('reports other statuses as rejected', async () => {
    mockFetch.mockResolvedValueOnce({ status: 400 });

    await expect(createMailingListGateway(config).enroll(ann)).resolves.toEqual({
      ok: false,
      reason: 'rejected',
      status: 400,
    });
  });

  test.each([
    ['apiKey', { ...config, apiKey: '' }],
    ['listId', { ...config, listId: '' }],
    ['serverPrefix', { ...config, serverPrefix: '' }],
  ])('fails closed without a request when %s is missing', async (_field, partial) => {
    const gateway = createMailingListGateway(partial);

    expect(gateway.isConfigured()).toBe(false);
    await expect(gateway.enroll(ann)).resolves.toEqual({ ok: false, reason: 'not-configured' });
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
