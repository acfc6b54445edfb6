// ============================================================================
// Tests: Express Review API
// ============================================================================
//
// Each test gets its own store and fake gateways through createApp's
// dependency injection; nothing reaches a remote service.

import { describe, test, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';

const LINKEDIN = 'What is your LinkedIn profile?';

vi.mock('../../config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../config.js')>();
  return {
    ...actual,
    appConfig: {
      ...actual.appConfig,
      server: { port: 0, maxUploadBytes: 1024 },
      csv: { linkedinColumn: 'What is your LinkedIn profile?' },
    },
  };
});

import { createApp } from '../server.js';
import { ContactStore } from '../../sessions/store.js';
import type { Contact } from '../../contacts/types.js';
import type { EnrollmentGateways, EnrollmentOutcome } from '../../enrollment/types.js';

// ============================================================================
// Shared Setup
// ============================================================================

const mailingListEnroll = vi.fn<(contact: Contact) => Promise<EnrollmentOutcome>>();
const crmEnroll = vi.fn<(contact: Contact) => Promise<EnrollmentOutcome>>();

const gateways: EnrollmentGateways = {
  mailingList: { target: 'mailingList', isConfigured: () => false, enroll: mailingListEnroll },
  crm: { target: 'crm', isConfigured: () => true, enroll: crmEnroll },
};

let store: ContactStore;
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  mailingListEnroll.mockReset().mockResolvedValue({ ok: false, reason: 'not-configured' });
  crmEnroll.mockReset().mockResolvedValue({ ok: true, status: 201 });
  store = new ContactStore({ ttlMs: 0, maxCount: 0 });
  app = createApp({ store, gateways });
});

const VALID_CSV = [
  `name,email,${LINKEDIN}`,
  'Ann Lee,ann@x.com,linkedin.com/in/ann?trk=1',
  ',bob@y.org,https://linkedin.com/in/bob',
  'Cy Park,cy@z.io,https://www.linkedin.com/in/cy',
].join('\n');

const ann: Contact = { name: 'Ann Lee', email: 'ann@x.com', linkedinUrl: 'https://linkedin.com/in/ann' };
const cy: Contact = { name: 'Cy Park', email: 'cy@z.io', linkedinUrl: 'https://www.linkedin.com/in/cy' };

// ============================================================================
// Liveness
// ============================================================================

describe('GET /', () => {
  test('returns the running message', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'CSV contact review service is running' });
  });
});

describe('GET /health', () => {
  test('reports status and live session count', async () => {
    store.create([ann]);

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.activeSessions).toBe(1);
    expect(typeof res.body.timestamp).toBe('string');
  });
});

// ============================================================================
// POST /upload-csv
// ============================================================================

describe('POST /upload-csv', () => {
  test('creates a session and returns the preview and rejected rows', async () => {
    const res = await request(app).post('/upload-csv').attach('file', Buffer.from(VALID_CSV), 'contacts.csv');

    expect(res.status).toBe(200);
    expect(res.body.totalContacts).toBe(2);
    expect(res.body.contacts).toEqual([ann, cy]);
    expect(res.body.rejectedRows).toEqual([{ row: 2, reason: 'missing-name' }]);
    expect(store.get(res.body.sessionId)?.contacts).toEqual([ann, cy]);
  });

  test('accepts an upper-case .CSV extension', async () => {
    const res = await request(app).post('/upload-csv').attach('file', Buffer.from(VALID_CSV), 'CONTACTS.CSV');

    expect(res.status).toBe(200);
  });

  test('rejects a file without a .csv extension', async () => {
    const res = await request(app).post('/upload-csv').attach('file', Buffer.from(VALID_CSV), 'contacts.xlsx');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'File must be a CSV' });
    expect(store.count()).toBe(0);
  });

  test('rejects a request without a file', async () => {
    const res = await request(app).post('/upload-csv').field('note', 'no file here');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Missing file upload (multipart field "file")' });
  });

  test('rejects a file with no valid contacts and lists the rejections', async () => {
    const csv = `name,email,${LINKEDIN}\nAnn Lee,not-an-email,linkedin.com/in/ann\n`;

    const res = await request(app).post('/upload-csv').attach('file', Buffer.from(csv), 'contacts.csv');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'No valid contacts found in CSV',
      kind: 'empty',
      rejectedRows: [{ row: 1, reason: 'invalid-email' }],
    });
    expect(store.count()).toBe(0);
  });

  test('rejects a file missing required columns', async () => {
    const res = await request(app)
      .post('/upload-csv')
      .attach('file', Buffer.from('name,email\nAnn Lee,ann@x.com\n'), 'contacts.csv');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: `CSV is missing required columns: ${LINKEDIN}`,
      kind: 'missing-columns',
      missingColumns: [LINKEDIN],
    });
  });

  test('rejects binary content with 400 and no session id', async () => {
    const res = await request(app)
      .post('/upload-csv')
      .attach('file', Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00, 0x00]), 'contacts.csv');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'File is not a text CSV (binary content detected)',
      kind: 'malformed-file',
    });
  });

  test('rejects an upload over the size limit with 413', async () => {
    const oversized = Buffer.from(`name,email,${LINKEDIN}\n` + 'x'.repeat(2048));

    const res = await request(app).post('/upload-csv').attach('file', oversized, 'contacts.csv');

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: 'File too large' });
    expect(store.count()).toBe(0);
  });
});

// ============================================================================
// POST /review-contact
// ============================================================================

describe('POST /review-contact', () => {
  test('dispatches the requested targets and reports each result', async () => {
    const { sessionId } = store.create([ann, cy]);

    const res = await request(app)
      .post('/review-contact')
      .send({ sessionId, contactIndex: 1, addToMailingList: true, addToCrm: true });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      contact: cy,
      results: { mailingList: false, crm: true },
      outcomes: {
        mailingList: { ok: false, reason: 'not-configured' },
        crm: { ok: true, status: 201 },
      },
      processed: true,
    });
    expect(crmEnroll).toHaveBeenCalledWith(cy);
  });

  test('defaults both flags to false', async () => {
    const { sessionId } = store.create([ann]);

    const res = await request(app).post('/review-contact').send({ sessionId, contactIndex: 0 });

    expect(res.status).toBe(200);
    expect(res.body.results).toEqual({});
    expect(mailingListEnroll).not.toHaveBeenCalled();
    expect(crmEnroll).not.toHaveBeenCalled();
  });

  test('returns 404 for an unknown session', async () => {
    const res = await request(app)
      .post('/review-contact')
      .send({ sessionId: 'no-such-session', contactIndex: 0, addToCrm: true });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Review session not found' });
  });

  test('returns 400 for an out-of-range index without dispatching', async () => {
    const { sessionId } = store.create([ann]);

    const res = await request(app).post('/review-contact').send({ sessionId, contactIndex: 1, addToCrm: true });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid contact index', contactIndex: 1, totalContacts: 1 });
    expect(crmEnroll).not.toHaveBeenCalled();
    expect(store.listDispatchLog(sessionId)).toEqual([]);
  });

  test('returns 400 with the issues for an invalid body', async () => {
    const res = await request(app).post('/review-contact').send({ contactIndex: 0 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid request body', issues: ['sessionId: Required'] });
  });

  test('returns 400 for malformed JSON', async () => {
    const res = await request(app)
      .post('/review-contact')
      .set('Content-Type', 'application/json')
      .send('{"sessionId":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid JSON body' });
  });
});

// ============================================================================
// Session reads
// ============================================================================

describe('GET /contacts/:sessionId', () => {
  test('returns every contact of the session', async () => {
    const { sessionId } = store.create([ann, cy]);

    const res = await request(app).get(`/contacts/${sessionId}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ sessionId, totalContacts: 2, contacts: [ann, cy] });
  });

  test('returns 404 for an unknown session', async () => {
    const res = await request(app).get('/contacts/no-such-session');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Review session not found' });
  });
});

describe('GET /sessions/:sessionId/dispatch-log', () => {
  test('lists recorded outcomes after a review', async () => {
    const { sessionId } = store.create([ann]);
    await request(app).post('/review-contact').send({ sessionId, contactIndex: 0, addToCrm: true });

    const res = await request(app).get(`/sessions/${sessionId}/dispatch-log`);

    expect(res.status).toBe(200);
    expect(res.body.sessionId).toBe(sessionId);
    expect(res.body.entries).toHaveLength(1);
    expect(res.body.entries[0]).toMatchObject({
      contactIndex: 0,
      target: 'crm',
      ok: true,
      outcome: { ok: true, status: 201 },
    });
  });

  test('returns 404 for an unknown session', async () => {
    const res = await request(app).get('/sessions/no-such-session/dispatch-log');

    expect(res.status).toBe(404);
  });
});
