/**
 * Review Bot Messages
 *
 * Text and keyboard builders for the chat conversation. Plain text only
 * (no parse_mode): contact names and URLs routinely contain Markdown
 * control characters.
 */

import { appConfig } from '../config.js';
import type { Contact } from '../contacts/types.js';
import type { TargetService } from '../enrollment/types.js';
import type { InlineKeyboardMarkup, ReviewAction } from './types.js';

export const TARGET_LABELS: Readonly<Record<TargetService, string>> = {
  mailingList: 'Mailing list',
  crm: 'CRM',
};

export function buildWelcomeText(linkedinColumn: string = appConfig.csv.linkedinColumn): string {
  return [
    '🤖 CSV Contact Review Bot',
    '',
    'Upload a CSV of contacts and review them one by one. Each contact can be added to the mailing list, the CRM, both, or skipped.',
    '',
    'Expected CSV columns:',
    '• name: full name',
    '• email: email address',
    `• ${linkedinColumn}: LinkedIn profile URL`,
    '• first_name, last_name (optional)',
    '',
    'Send a .csv file to begin 📁',
  ].join('\n');
}

export const HELP_TEXT = [
  '📋 Commands',
  '/start: instructions',
  '/help: this message',
  '',
  'For each contact:',
  '✅ Add to Mailing List: subscribe to the email list',
  '✅ Add to CRM: create a person in the CRM',
  '✅ Add to Both: both of the above',
  '❌ Skip: add nowhere and move on',
].join('\n');

export function formatContactCard(contact: Contact, index: number, total: number): string {
  return [
    `👤 Contact ${index + 1} of ${total}`,
    '',
    `Name: ${contact.name}`,
    `Email: ${contact.email}`,
    `LinkedIn: ${contact.linkedinUrl}`,
  ].join('\n');
}

export function buildReviewKeyboard(index: number): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: '✅ Add to Mailing List', callback_data: `mailingList:${index}` },
        { text: '✅ Add to CRM', callback_data: `crm:${index}` },
      ],
      [
        { text: '✅ Add to Both', callback_data: `both:${index}` },
        { text: '❌ Skip', callback_data: `skip:${index}` },
      ],
    ],
  };
}

const CALLBACK_PATTERN = /^(mailingList|crm|both|skip):(\d+)$/;

function isReviewAction(value: string): value is ReviewAction {
  return value === 'mailingList' || value === 'crm' || value === 'both' || value === 'skip';
}

/** Parses "action:index" button data; null for anything else */
export function parseCallbackData(data: string | undefined): { action: ReviewAction; index: number } | null {
  const match = data ? CALLBACK_PATTERN.exec(data) : null;
  if (!match || !isReviewAction(match[1])) {
    return null;
  }
  return { action: match[1], index: Number(match[2]) };
}

export function targetsForAction(action: ReviewAction): TargetService[] {
  switch (action) {
    case 'mailingList':
      return ['mailingList'];
    case 'crm':
      return ['crm'];
    case 'both':
      return ['mailingList', 'crm'];
    case 'skip':
      return [];
  }
}

/**
 * One line per requested target. A target missing from `results` (the
 * review call itself failed) is shown as failed.
 */
export function formatReviewSummary(
  name: string,
  requested: readonly TargetService[],
  results: Partial<Record<TargetService, boolean>>,
): string {
  const lines = requested.map(
    (target) => `${TARGET_LABELS[target]}: ${results[target] ? '✅ Added' : '❌ Failed'}`,
  );
  return [`📊 Results for ${name}:`, '', ...lines].join('\n');
}

export function formatSkipped(name: string): string {
  return `⏭️ Skipped: ${name}`;
}
