// ============================================================================
// Tests: CRM Gateway
// ============================================================================

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { buildCrmPerson, createCrmGateway } from '../crm.js';
import type { CrmConfig } from '../config.js';
import type { Contact } from '../../contacts/types.js';

const mockFetch = vi.fn();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

const config: CrmConfig = {
  apiKey: 'test-crm-token',
  domain: 'acme',
  timeoutMs: 5000,
};

const ann: Contact = {
  name: 'Ann Lee',
  email: 'ann@x.com',
  linkedinUrl: 'https://linkedin.com/in/ann',
};

describe('buildCrmPerson', () => {
  test('maps a contact to a person with one primary work email', () => {
    expect(buildCrmPerson(ann)).toEqual({
      name: 'Ann Lee',
      email: [{ value: 'ann@x.com', primary: true, label: 'work' }],
      linkedin: 'https://linkedin.com/in/ann',
    });
  });
});

describe('createCrmGateway', () => {
  test('posts the person with the token as a query parameter', async () => {
    mockFetch.mockResolvedValueOnce({ status: 201 });

    const outcome = await createCrmGateway(config).enroll(ann);

    expect(outcome).toEqual({ ok: true, status: 201 });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://acme.pipedrive.com/api/v1/persons?api_token=test-crm-token');
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBeUndefined();
    expect(JSON.parse(init.body)).toEqual(buildCrmPerson(ann));
  });

  test('only 201 counts as success', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200 });

    await expect(createCrmGateway(config).enroll(ann)).resolves.toEqual({
      ok: false,
      reason: 'rejected',
      status: 200,
    });
  });

  test('fails closed without a request when the domain is missing', async () => {
    const gateway = createCrmGateway({ ...config, domain: '' });

    expect(gateway.isConfigured()).toBe(false);
    await expect(gateway.enroll(ann)).resolves.toEqual({ ok: false, reason: 'not-configured' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  test('fails closed without a request when the token is missing', async () => {
    const gateway = createCrmGateway({ ...config, apiKey: '' });

    await expect(gateway.enroll(ann)).resolves.toEqual({ ok: false, reason: 'not-configured' });
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
