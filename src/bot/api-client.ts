/**
 * Review API Client
 *
 * HTTP client the bot uses to reach the review API. It owns no state: the
 * API re-validates session ids and contact indexes on every call.
 */

import type {
  ReviewContactBody,
  ReviewContactResponse,
  SessionContactsResponse,
  UploadCsvResponse,
} from '../api/types.js';
import { ReviewApiError } from './errors.js';
import type { ReviewApi } from './types.js';

// Must outlast a review that waits on both enrollment targets
const API_TIMEOUT_MS = 30_000;

export class ReviewApiClient implements ReviewApi {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async uploadCsv(fileName: string, bytes: Buffer): Promise<UploadCsvResponse> {
    const form = new FormData();
    form.append('file', new Blob([bytes], { type: 'text/csv' }), fileName);

    return this.request<UploadCsvResponse>('/upload-csv', { method: 'POST', body: form });
  }

  async getContacts(sessionId: string): Promise<SessionContactsResponse> {
    return this.request<SessionContactsResponse>(`/contacts/${encodeURIComponent(sessionId)}`, {
      method: 'GET',
    });
  }

  async reviewContact(body: ReviewContactBody): Promise<ReviewContactResponse> {
    return this.request<ReviewContactResponse>('/review-contact', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  private async request<T>(path: string, init: RequestInit): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(API_TIMEOUT_MS),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new ReviewApiError(response.status, extractErrorMessage(text, response.status));
    }

    return JSON.parse(text) as T;
  }
}

/** The `error` field of a JSON error body, else the raw text */
export function extractErrorMessage(text: string, status: number): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text || `HTTP ${status}`;
  }

  if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error;
  }
  return text || `HTTP ${status}`;
}
