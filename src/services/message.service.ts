/**
 * Message Log
 *
 * Append-only sequence of utterances for each conversation. Appending a
 * message bumps the matching role counter on the parent in the same
 * transaction, so counters only drift if rows are written outside this service.
 */

import { SqliteDatabase, runImmediate } from '../database/connection';
import logger from '../config/logger';
import { ERROR_MESSAGES } from '../config/constants';
import { Message, MessageInput, MessageRole } from '../types/conversation.types';
import { MessageRecord } from '../types/database.types';
import { NotFoundError } from '../utils/errors.util';
import { assertConfidence, assertMessageRole, assertNonEmptyText, toStoredTimestamp } from '../utils/validation.util';
import errorHandler from './errorHandler.service';

export const toMessage = (record: MessageRecord): Message => ({
  id: record.id,
  conversationId: record.conversation_id,
  role: assertMessageRole(record.role),
  content: record.content,
  confidence: record.confidence,
  timestamp: record.timestamp,
  createdAt: record.created_at,
});

export class MessageService {
  private log = logger.child({ service: 'message-log' });

  private readonly insertStmt;
  private readonly parentExistsStmt;
  private readonly incrementUserStmt;
  private readonly incrementAssistantStmt;
  private readonly listStmt;

  constructor(private readonly db: SqliteDatabase) {
    this.insertStmt = db.prepare<[number, MessageRole, string, number | null, string]>(`
      INSERT INTO mensajes (conversation_id, role, content, confidence, timestamp)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.parentExistsStmt = db.prepare<[number], { id: number }>('SELECT id FROM conversaciones WHERE id = ?');
    this.incrementUserStmt = db.prepare<[number]>(`
      UPDATE conversaciones SET total_user_messages = COALESCE(total_user_messages, 0) + 1 WHERE id = ?
    `);
    this.incrementAssistantStmt = db.prepare<[number]>(`
      UPDATE conversaciones SET total_assistant_messages = COALESCE(total_assistant_messages, 0) + 1 WHERE id = ?
    `);
    // Replay order: utterance time, then insertion order for ties
    this.listStmt = db.prepare<[number], MessageRecord>(`
      SELECT * FROM mensajes WHERE conversation_id = ? ORDER BY timestamp ASC, id ASC
    `);
  }

  /**
   * Append one utterance to a conversation
   */
  append(conversationId: number, input: MessageInput): number {
    const context = { operation: 'append', conversationId };

    return errorHandler.guard('message', context, () => {
      const role = assertMessageRole(input.role);
      const content = assertNonEmptyText(input.content, 'content');
      const timestamp = toStoredTimestamp(input.timestamp);
      const confidence =
        input.confidence === undefined || input.confidence === null ? null : assertConfidence(input.confidence);

      const messageId = runImmediate(this.db, () => {
        if (!this.parentExistsStmt.get(conversationId)) {
          throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { conversationId });
        }

        const result = this.insertStmt.run(conversationId, role, content, confidence, timestamp);
        const counter = role === 'user' ? this.incrementUserStmt : this.incrementAssistantStmt;
        counter.run(conversationId);

        return Number(result.lastInsertRowid);
      });

      this.log.debug(
        { conversationId, messageId, role, preview: content.slice(0, 50) },
        'Message appended'
      );

      return messageId;
    });
  }

  /**
   * Messages of a conversation in replay order.
   *
   * The result is lazy and restartable: every iteration opens a new cursor.
   * While a cursor is open the connection cannot run other statements, so
   * finish (or break out of) the loop before writing.
   */
  listByConversation(conversationId: number): Iterable<Message> {
    const stmt = this.listStmt;
    return {
      *[Symbol.iterator]() {
        for (const record of stmt.iterate(conversationId)) {
          yield toMessage(record);
        }
      },
    };
  }

  getMessages(conversationId: number): Message[] {
    return this.listStmt.all(conversationId).map(toMessage);
  }
}
