/**
 * Review Driver — Chat Conversation State
 *
 * Walks one reviewer through an uploaded CSV, one contact at a time:
 *
 *   document upload → POST /upload-csv → show contact 0
 *   button tap      → POST /review-contact (unless skip) → summary → next contact
 *   last contact    → completion message, local session dropped
 *
 * The driver tracks the "current index" per chat user; the review API holds
 * the contacts and re-checks every index it is sent. A tap on a button for
 * any contact other than the current one is answered with a notice and
 * ignored, and taps that arrive while a choice is still being dispatched
 * are turned away.
 *
 * Uploading a new CSV replaces the user's review, even mid-dispatch. Every
 * step that resumes after an await checks that its review is still the
 * current one before advancing, showing a card or dropping the review.
 */

import type { Contact } from '../contacts/types.js';
import type { TargetService } from '../enrollment/types.js';
import type { UploadCsvResponse } from '../api/types.js';
import { describeError } from '../sanitize.js';
import {
  buildReviewKeyboard,
  buildWelcomeText,
  formatContactCard,
  formatReviewSummary,
  formatSkipped,
  HELP_TEXT,
  parseCallbackData,
  targetsForAction,
} from './messages.js';
import type {
  ChatTransport,
  ReviewApi,
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
} from './types.js';

interface UserReviewState {
  chatId: number;
  sessionId: string;
  totalContacts: number;
  currentIndex: number;
  /** Contact shown for currentIndex, once loaded */
  currentContact: Contact | null;
  /** A button choice is being dispatched */
  busy: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ReviewDriver {
  private readonly transport: ChatTransport;
  private readonly api: ReviewApi;
  private readonly states = new Map<number, UserReviewState>();

  constructor(transport: ChatTransport, api: ReviewApi) {
    this.transport = transport;
    this.api = api;
  }

  /** Number of users with a review in progress */
  get activeReviews(): number {
    return this.states.size;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.callback_query) {
      await this.handleCallback(update.callback_query);
      return;
    }

    const message = update.message;
    if (!message) {
      return;
    }

    if (message.document) {
      await this.handleDocument(message);
      return;
    }

    const command = message.text?.trim().split(/\s+/)[0]?.replace(/@.*$/, '');
    if (command === '/start') {
      await this.transport.sendMessage(message.chat.id, buildWelcomeText());
    } else if (command === '/help') {
      await this.transport.sendMessage(message.chat.id, HELP_TEXT);
    }
  }

  private async handleDocument(message: TelegramMessage): Promise<void> {
    const chatId = message.chat.id;
    const userId = message.from?.id ?? chatId;
    const document = message.document;
    if (!document) {
      return;
    }

    const fileName = document.file_name ?? '';
    if (!fileName.toLowerCase().endsWith('.csv')) {
      await this.transport.sendMessage(chatId, '❌ Please upload a CSV file (.csv extension)');
      return;
    }

    await this.transport.sendMessage(chatId, '📥 Processing your CSV file...');

    let upload: UploadCsvResponse;
    try {
      const bytes = await this.transport.downloadFile(document.file_id);
      upload = await this.api.uploadCsv(fileName, bytes);
    } catch (error) {
      console.error('[bot] CSV upload failed', { userId, error: describeError(error) });
      await this.transport.sendMessage(chatId, `❌ Error processing CSV: ${errorMessage(error)}`);
      return;
    }

    console.log('[bot] Review started', {
      userId,
      sessionId: upload.sessionId,
      totalContacts: upload.totalContacts,
    });

    this.states.set(userId, {
      chatId,
      sessionId: upload.sessionId,
      totalContacts: upload.totalContacts,
      currentIndex: 0,
      currentContact: null,
      busy: false,
    });

    if (upload.rejectedRows.length > 0) {
      await this.transport.sendMessage(
        chatId,
        `ℹ️ ${upload.totalContacts} valid contacts found, ${upload.rejectedRows.length} rows skipped as invalid.`,
      );
    }

    await this.showCurrentContact(userId);
  }

  private async showCurrentContact(userId: number): Promise<void> {
    const state = this.states.get(userId);
    if (!state) {
      return;
    }

    if (state.currentIndex >= state.totalContacts) {
      this.states.delete(userId);
      await this.transport.sendMessage(state.chatId, '✅ All contacts have been reviewed!');
      return;
    }

    let contact: Contact | undefined;
    try {
      const { contacts } = await this.api.getContacts(state.sessionId);
      contact = contacts[state.currentIndex];
    } catch (error) {
      console.error('[bot] Failed to load contact', {
        userId,
        sessionId: state.sessionId,
        error: describeError(error),
      });
    }

    if (!this.isCurrent(userId, state)) {
      return;
    }

    if (!contact) {
      await this.transport.sendMessage(state.chatId, '❌ Error loading contact details');
      return;
    }

    state.currentContact = contact;
    await this.transport.sendMessage(
      state.chatId,
      formatContactCard(contact, state.currentIndex, state.totalContacts),
      buildReviewKeyboard(state.currentIndex),
    );
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const userId = query.from.id;
    const state = this.states.get(userId);

    if (!state) {
      await this.transport.answerCallback(query.id, '❌ No active session found');
      return;
    }
    if (state.busy) {
      await this.transport.answerCallback(query.id, '⏳ Still processing the previous choice');
      return;
    }

    state.busy = true;
    try {
      await this.applyChoice(query, state, userId);
    } finally {
      state.busy = false;
    }
  }

  private async applyChoice(query: TelegramCallbackQuery, state: UserReviewState, userId: number): Promise<void> {
    await this.transport.answerCallback(query.id);

    const choice = parseCallbackData(query.data);
    if (!choice) {
      console.warn('[bot] Unrecognized callback data', { userId, data: query.data });
      return;
    }

    const chatId = query.message?.chat.id ?? state.chatId;
    const messageId = query.message?.message_id;
    const reply = (text: string) =>
      messageId === undefined
        ? this.transport.sendMessage(chatId, text)
        : this.transport.editMessage(chatId, messageId, text);

    const contact = state.currentContact;
    if (choice.index !== state.currentIndex || !contact) {
      await reply('⚠️ This contact has already been processed. Please continue with the current contact.');
      return;
    }

    if (choice.action === 'skip') {
      await reply(formatSkipped(contact.name));
    } else {
      const targets = targetsForAction(choice.action);
      const results = await this.dispatch(state, targets);
      await reply(formatReviewSummary(contact.name, targets, results));
    }

    if (!this.isCurrent(userId, state)) {
      console.log('[bot] Review replaced during dispatch', { userId, sessionId: state.sessionId });
      return;
    }

    state.currentIndex += 1;
    state.currentContact = null;

    if (state.currentIndex < state.totalContacts) {
      await this.showCurrentContact(userId);
    } else {
      this.states.delete(userId);
      await this.transport.sendMessage(
        state.chatId,
        "🎉 All contacts processed!\n\nUpload another CSV file when you're ready.",
      );
    }
  }

  private isCurrent(userId: number, state: UserReviewState): boolean {
    return this.states.get(userId) === state;
  }

  /** Review call for the current contact; a failed call reports every target as failed */
  private async dispatch(
    state: UserReviewState,
    targets: TargetService[],
  ): Promise<Partial<Record<TargetService, boolean>>> {
    try {
      const response = await this.api.reviewContact({
        sessionId: state.sessionId,
        contactIndex: state.currentIndex,
        addToMailingList: targets.includes('mailingList'),
        addToCrm: targets.includes('crm'),
      });
      return response.results;
    } catch (error) {
      console.error('[bot] Review request failed', {
        sessionId: state.sessionId,
        contactIndex: state.currentIndex,
        error: describeError(error),
      });
      return {};
    }
  }
}
