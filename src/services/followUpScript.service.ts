/**
 * Follow-up Script Store
 *
 * Scripts are written by the follow-up generator and flipped to sent exactly
 * once by the delivery sweeper. Sent is terminal: fecha_envio never changes.
 */

import { SqliteDatabase, runImmediate } from '../database/connection';
import logger from '../config/logger';
import { ERROR_MESSAGES, PAGINATION } from '../config/constants';
import { FollowUpScript, PageOptions, Timestamp } from '../types/conversation.types';
import { FollowUpScriptRecord } from '../types/database.types';
import { InvalidStateError, NotFoundError } from '../utils/errors.util';
import { assertNonEmptyText, normalizeLimit, normalizeOffset, toStoredTimestamp } from '../utils/validation.util';
import errorHandler from './errorHandler.service';

export const toFollowUpScript = (record: FollowUpScriptRecord): FollowUpScript => ({
  id: record.id,
  conversationId: record.conversation_id,
  scriptContent: record.script_content,
  sent: record.enviado === 1,
  sentAt: record.fecha_envio,
  createdAt: record.created_at,
});

export class FollowUpScriptService {
  private log = logger.child({ service: 'follow-up-scripts' });

  private readonly parentExistsStmt;
  private readonly insertStmt;
  private readonly byIdStmt;
  private readonly markSentStmt;
  private readonly pendingStmt;
  private readonly byConversationStmt;

  constructor(private readonly db: SqliteDatabase) {
    this.parentExistsStmt = db.prepare<[number], { id: number }>('SELECT id FROM conversaciones WHERE id = ?');
    this.insertStmt = db.prepare<[number, string]>(`
      INSERT INTO scripts_seguimiento (conversation_id, script_content) VALUES (?, ?)
    `);
    this.byIdStmt = db.prepare<[number], FollowUpScriptRecord>('SELECT * FROM scripts_seguimiento WHERE id = ?');
    this.markSentStmt = db.prepare<[string, number]>(`
      UPDATE scripts_seguimiento SET enviado = 1, fecha_envio = ? WHERE id = ? AND COALESCE(enviado, 0) = 0
    `);
    this.pendingStmt = db.prepare<[number, number], FollowUpScriptRecord>(`
      SELECT * FROM scripts_seguimiento
      WHERE COALESCE(enviado, 0) = 0
      ORDER BY created_at ASC, id ASC
      LIMIT ? OFFSET ?
    `);
    this.byConversationStmt = db.prepare<[number], FollowUpScriptRecord>(`
      SELECT * FROM scripts_seguimiento WHERE conversation_id = ? ORDER BY id ASC
    `);
  }

  create(conversationId: number, scriptContent: string): number {
    const context = { operation: 'createScript', conversationId };

    return errorHandler.guard('script', context, () => {
      const content = assertNonEmptyText(scriptContent, 'scriptContent');

      const scriptId = runImmediate(this.db, () => {
        if (!this.parentExistsStmt.get(conversationId)) {
          throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { conversationId });
        }
        return Number(this.insertStmt.run(conversationId, content).lastInsertRowid);
      });

      this.log.info({ conversationId, scriptId }, 'Follow-up script saved');
      return scriptId;
    });
  }

  /**
   * One-way transition unsent -> sent
   */
  markSent(scriptId: number, sentTime: Timestamp = new Date()): FollowUpScript {
    const context = { operation: 'markSent', scriptId };

    return errorHandler.guard('script', context, () => {
      const sentAt = toStoredTimestamp(sentTime, 'sentTime');

      const script = runImmediate(this.db, () => {
        const current = this.byIdStmt.get(scriptId);
        if (!current) {
          throw new NotFoundError(ERROR_MESSAGES.SCRIPT_NOT_FOUND, { scriptId });
        }
        if (current.enviado === 1) {
          throw new InvalidStateError(ERROR_MESSAGES.SCRIPT_ALREADY_SENT, {
            scriptId,
            sentAt: current.fecha_envio,
          });
        }

        this.markSentStmt.run(sentAt, scriptId);
        return this.getById(scriptId);
      });

      this.log.info({ scriptId, conversationId: script.conversationId, sentAt }, 'Follow-up script marked as sent');
      return script;
    });
  }

  findById(scriptId: number): FollowUpScript | null {
    const record = this.byIdStmt.get(scriptId);
    return record ? toFollowUpScript(record) : null;
  }

  getById(scriptId: number): FollowUpScript {
    const script = this.findById(scriptId);
    if (!script) {
      throw new NotFoundError(ERROR_MESSAGES.SCRIPT_NOT_FOUND, { scriptId });
    }
    return script;
  }

  /**
   * Unsent scripts, oldest first, for the delivery sweeper
   */
  listPending(options: PageOptions = {}): FollowUpScript[] {
    const limit = normalizeLimit(options.limit, PAGINATION.MAX_LIMIT, PAGINATION.MAX_LIMIT);
    const offset = normalizeOffset(options.offset);
    return this.pendingStmt.all(limit, offset).map(toFollowUpScript);
  }

  listByConversation(conversationId: number): FollowUpScript[] {
    return this.byConversationStmt.all(conversationId).map(toFollowUpScript);
  }
}
