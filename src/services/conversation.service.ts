/**
 * Conversation Store
 *
 * Owns the identity (surrogate id + call_sid), timing and message counters
 * of each recorded call. Deleting a conversation removes its messages,
 * analysis and follow-up scripts through ON DELETE CASCADE.
 */

import { SqliteDatabase, runImmediate } from '../database/connection';
import logger from '../config/logger';
import { ERROR_MESSAGES, PAGINATION } from '../config/constants';
import {
  Conversation,
  ConversationFinalization,
  ConversationRef,
  MessageCounts,
  PageOptions,
  Timestamp,
} from '../types/conversation.types';
import { ConversationRecord } from '../types/database.types';
import { InvalidArgumentError, NotFoundError } from '../utils/errors.util';
import {
  assertNonEmptyText,
  assertNonNegativeInteger,
  assertNonNegativeNumber,
  normalizeLimit,
  normalizeOffset,
  toStoredTimestamp,
} from '../utils/validation.util';
import { cleanPhoneNumber, maskPhoneNumber } from '../utils/phoneNumber.util';
import errorHandler from './errorHandler.service';

export const toConversation = (record: ConversationRecord): Conversation => ({
  id: record.id,
  callSid: record.call_sid,
  phoneNumber: record.phone_number,
  startTime: record.start_time,
  endTime: record.end_time,
  durationSeconds: record.duration_seconds,
  totalUserMessages: record.total_user_messages ?? 0,
  totalAssistantMessages: record.total_assistant_messages ?? 0,
  createdAt: record.created_at,
});

export class ConversationService {
  private log = logger.child({ service: 'conversation-store' });

  private readonly insertStmt;
  private readonly byIdStmt;
  private readonly byCallSidStmt;
  private readonly finalizeStmt;
  private readonly deleteStmt;
  private readonly recentStmt;
  private readonly countRolesStmt;
  private readonly setCountsStmt;

  constructor(private readonly db: SqliteDatabase) {
    this.insertStmt = db.prepare<[string, string | null, string]>(`
      INSERT INTO conversaciones (call_sid, phone_number, start_time)
      VALUES (?, ?, ?)
    `);
    this.byIdStmt = db.prepare<[number], ConversationRecord>('SELECT * FROM conversaciones WHERE id = ?');
    this.byCallSidStmt = db.prepare<[string], ConversationRecord>('SELECT * FROM conversaciones WHERE call_sid = ?');
    this.finalizeStmt = db.prepare<[string, number, number, number, number]>(`
      UPDATE conversaciones
      SET end_time = ?, duration_seconds = ?, total_user_messages = ?, total_assistant_messages = ?
      WHERE id = ?
    `);
    this.deleteStmt = db.prepare<[number]>('DELETE FROM conversaciones WHERE id = ?');
    this.recentStmt = db.prepare<[number, number], ConversationRecord>(`
      SELECT * FROM conversaciones ORDER BY start_time DESC, id DESC LIMIT ? OFFSET ?
    `);
    this.countRolesStmt = db.prepare<[number], { user_count: number; assistant_count: number }>(`
      SELECT
        COUNT(CASE WHEN role = 'user' THEN 1 END) AS user_count,
        COUNT(CASE WHEN role = 'assistant' THEN 1 END) AS assistant_count
      FROM mensajes
      WHERE conversation_id = ?
    `);
    this.setCountsStmt = db.prepare<[number, number, number]>(`
      UPDATE conversaciones SET total_user_messages = ?, total_assistant_messages = ? WHERE id = ?
    `);
  }

  /**
   * Register a new call. Fails with DuplicateKeyError if call_sid is taken.
   */
  create(callSid: string, phoneNumber: string | null | undefined, startTime: Timestamp): number {
    const context = { operation: 'create', callSid };

    return errorHandler.guard('conversation', context, () => {
      const sid = assertNonEmptyText(callSid, 'callSid').trim();
      const start = toStoredTimestamp(startTime, 'startTime');
      const phone = cleanPhoneNumber(phoneNumber);

      const result = this.insertStmt.run(sid, phone, start);
      const conversationId = Number(result.lastInsertRowid);

      this.log.info(
        { conversationId, callSid: sid, phoneNumber: maskPhoneNumber(phone) },
        'Conversation created'
      );

      return conversationId;
    });
  }

  /**
   * Record end time, duration and final message counts. Last writer wins.
   */
  finalize(conversationId: number, finalization: ConversationFinalization): void {
    const context = { operation: 'finalize', conversationId };

    errorHandler.guard('conversation', context, () => {
      const endTime = toStoredTimestamp(finalization.endTime, 'endTime');
      const duration = assertNonNegativeNumber(finalization.durationSeconds, 'durationSeconds');
      const userMessages = assertNonNegativeInteger(finalization.userMessages, 'userMessages');
      const assistantMessages = assertNonNegativeInteger(finalization.assistantMessages, 'assistantMessages');

      runImmediate(this.db, () => {
        const conversation = this.getById(conversationId);

        if (Date.parse(endTime) < Date.parse(conversation.startTime)) {
          throw new InvalidArgumentError(ERROR_MESSAGES.END_BEFORE_START, {
            startTime: conversation.startTime,
            endTime,
          });
        }

        this.finalizeStmt.run(endTime, duration, userMessages, assistantMessages, conversationId);
      });

      this.log.info({ conversationId, durationSeconds: duration, userMessages, assistantMessages }, 'Conversation finalized');
    });
  }

  findById(conversationId: number): Conversation | null {
    const record = this.byIdStmt.get(conversationId);
    return record ? toConversation(record) : null;
  }

  findByCallSid(callSid: string): Conversation | null {
    const record = this.byCallSidStmt.get(callSid);
    return record ? toConversation(record) : null;
  }

  getById(conversationId: number): Conversation {
    const conversation = this.findById(conversationId);
    if (!conversation) {
      throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { conversationId });
    }
    return conversation;
  }

  getByCallSid(callSid: string): Conversation {
    const conversation = this.findByCallSid(callSid);
    if (!conversation) {
      throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { callSid });
    }
    return conversation;
  }

  /**
   * Numbers are surrogate ids, strings are call_sids
   */
  get(ref: ConversationRef): Conversation {
    return typeof ref === 'number' ? this.getById(ref) : this.getByCallSid(ref);
  }

  find(ref: ConversationRef): Conversation | null {
    return typeof ref === 'number' ? this.findById(ref) : this.findByCallSid(ref);
  }

  /**
   * Delete a conversation and, by cascade, every owned row. Irreversible.
   */
  delete(conversationId: number): void {
    const context = { operation: 'delete', conversationId };

    errorHandler.guard('conversation', context, () => {
      runImmediate(this.db, () => {
        const result = this.deleteStmt.run(conversationId);
        if (result.changes === 0) {
          throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { conversationId });
        }
      });

      this.log.info({ conversationId }, 'Conversation deleted');
    });
  }

  listRecent(options: PageOptions = {}): Conversation[] {
    const limit = normalizeLimit(options.limit, PAGINATION.RECENT_CONVERSATIONS, PAGINATION.MAX_LIMIT);
    const offset = normalizeOffset(options.offset);
    return this.recentStmt.all(limit, offset).map(toConversation);
  }

  /**
   * Count messages per role from the Message rows (the source of truth)
   */
  countMessages(conversationId: number): MessageCounts {
    const row = this.countRolesStmt.get(conversationId);
    return { user: row?.user_count ?? 0, assistant: row?.assistant_count ?? 0 };
  }

  /**
   * Overwrite the denormalized counters with the actual Message row counts
   */
  syncMessageCounts(conversationId: number): MessageCounts {
    const context = { operation: 'syncMessageCounts', conversationId };

    return errorHandler.guard('conversation', context, () =>
      runImmediate(this.db, () => {
        this.getById(conversationId);
        const counts = this.countMessages(conversationId);
        this.setCountsStmt.run(counts.user, counts.assistant, conversationId);

        this.log.debug({ conversationId, ...counts }, 'Message counters synchronized');
        return counts;
      })
    );
  }
}
