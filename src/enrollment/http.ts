/**
 * Enrollment HTTP Helper
 *
 * Posts one JSON payload to a target service and folds every result into an
 * EnrollmentOutcome. Never throws.
 *
 * - Listed success status → { ok: true, status }
 * - Any other status      → { ok: false, reason: 'rejected', status }
 * - Timeout               → { ok: false, reason: 'timeout' }
 * - Any other fetch error → { ok: false, reason: 'network-error' }
 *
 * Response bodies are not logged: both targets echo the submitted email in
 * their error messages.
 */

import { describeError } from '../sanitize.js';
import type { EnrollmentOutcome, TargetService } from './types.js';

export interface EnrollmentRequest {
  target: TargetService;
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  successStatuses: readonly number[];
}

export async function postEnrollment(request: EnrollmentRequest): Promise<EnrollmentOutcome> {
  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...(request.headers ?? {}),
      },
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });

    if (request.successStatuses.includes(response.status)) {
      console.log('[enrollment] Enrolled', { target: request.target, status: response.status });
      return { ok: true, status: response.status };
    }

    console.warn('[enrollment] Rejected by remote service', {
      target: request.target,
      status: response.status,
    });
    return { ok: false, reason: 'rejected', status: response.status };
  } catch (error) {
    const timedOut = isTimeout(error);
    console.error('[enrollment] Request failed', {
      target: request.target,
      reason: timedOut ? 'timeout' : 'network-error',
      error: describeError(error),
    });
    return { ok: false, reason: timedOut ? 'timeout' : 'network-error' };
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
