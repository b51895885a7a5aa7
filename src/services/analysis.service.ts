/**
 * Analysis Record Store
 *
 * One lead analysis per conversation. The table itself does not enforce
 * uniqueness, so upsert() does: inside an immediate transaction an existing
 * row is replaced in place (same id, fresh created_at), otherwise one is inserted.
 */

import { SqliteDatabase, runImmediate } from '../database/connection';
import logger from '../config/logger';
import { ANALYSIS_DEFAULTS, ERROR_MESSAGES, LEAD_GRADE } from '../config/constants';
import { AnalysisInput, AnalysisRecord } from '../types/conversation.types';
import { AnalysisRow } from '../types/database.types';
import { NotFoundError } from '../utils/errors.util';
import {
  assertInterestLevel,
  assertLeadGrade,
  deriveSentimentLabel,
  serializeTextOrList,
} from '../utils/validation.util';
import errorHandler from './errorHandler.service';

// Column values in schema order, after conversation_id
type AnalysisValues = [
  resumen: string | null,
  sentimiento: string | null,
  sentimiento_detalle: string | null,
  interes_cliente: string | null,
  nivel_interes: number | null,
  calificacion_lead: string,
  proximos_pasos: string | null,
  propiedades_mencionadas: string | null,
  puntos_clave: string | null,
];

export const toAnalysisRecord = (row: AnalysisRow): AnalysisRecord => ({
  id: row.id,
  conversationId: row.conversation_id,
  summary: row.resumen,
  sentiment: row.sentimiento,
  sentimentDetail: row.sentimiento_detalle,
  customerInterest: row.interes_cliente,
  interestLevel: row.nivel_interes,
  leadGrade: row.calificacion_lead,
  nextSteps: row.proximos_pasos,
  mentionedProperties: row.propiedades_mencionadas,
  keyPoints: row.puntos_clave,
  createdAt: row.created_at,
});

/**
 * Validate and map engine output onto the persisted columns
 */
export const toAnalysisValues = (input: AnalysisInput): AnalysisValues => {
  const detail = input.sentimentDetail ?? null;
  const sentiment = input.sentiment ?? (detail !== null ? deriveSentimentLabel(detail) : null);
  const interestLevel =
    input.interestLevel === undefined || input.interestLevel === null ? null : assertInterestLevel(input.interestLevel);
  const leadGrade = input.leadGrade === undefined ? ANALYSIS_DEFAULTS.LEAD_GRADE : assertLeadGrade(input.leadGrade);

  return [
    input.summary ?? null,
    sentiment,
    detail,
    input.customerInterest ?? null,
    interestLevel,
    leadGrade,
    serializeTextOrList(input.nextSteps),
    serializeTextOrList(input.mentionedProperties),
    serializeTextOrList(input.keyPoints),
  ];
};

export class AnalysisService {
  private log = logger.child({ service: 'analysis-store' });

  private readonly parentExistsStmt;
  private readonly byConversationStmt;
  private readonly insertStmt;
  private readonly replaceStmt;

  constructor(private readonly db: SqliteDatabase) {
    this.parentExistsStmt = db.prepare<[number], { id: number }>('SELECT id FROM conversaciones WHERE id = ?');
    this.byConversationStmt = db.prepare<[number], AnalysisRow>(`
      SELECT * FROM analisis_conversaciones WHERE conversation_id = ? ORDER BY id DESC LIMIT 1
    `);
    this.insertStmt = db.prepare<[number, ...AnalysisValues]>(`
      INSERT INTO analisis_conversaciones (
        conversation_id, resumen, sentimiento, sentimiento_detalle, interes_cliente, nivel_interes,
        calificacion_lead, proximos_pasos, propiedades_mencionadas, puntos_clave
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.replaceStmt = db.prepare<[...AnalysisValues, number]>(`
      UPDATE analisis_conversaciones
      SET resumen = ?, sentimiento = ?, sentimiento_detalle = ?, interes_cliente = ?, nivel_interes = ?,
          calificacion_lead = ?, proximos_pasos = ?, propiedades_mencionadas = ?, puntos_clave = ?,
          created_at = CURRENT_TIMESTAMP
      WHERE id = ?
    `);
  }

  /**
   * Store the analysis for a conversation, replacing any previous one
   */
  upsert(conversationId: number, input: AnalysisInput): number {
    const context = { operation: 'upsert', conversationId };

    return errorHandler.guard('analysis', context, () => {
      const values = toAnalysisValues(input);

      const { analysisId, replaced } = runImmediate(this.db, () => {
        if (!this.parentExistsStmt.get(conversationId)) {
          throw new NotFoundError(ERROR_MESSAGES.CONVERSATION_NOT_FOUND, { conversationId });
        }

        const existing = this.byConversationStmt.get(conversationId);
        if (existing) {
          this.replaceStmt.run(...values, existing.id);
          return { analysisId: existing.id, replaced: true };
        }

        const result = this.insertStmt.run(conversationId, ...values);
        return { analysisId: Number(result.lastInsertRowid), replaced: false };
      });

      this.log.info(
        { conversationId, analysisId, replaced, leadGrade: values[5], interestLevel: values[4] },
        'Analysis saved'
      );

      if (values[5] === LEAD_GRADE.HOT) {
        this.log.info({ conversationId, analysisId }, 'Hot lead detected');
      }

      return analysisId;
    });
  }

  get(conversationId: number): AnalysisRecord | null {
    const row = this.byConversationStmt.get(conversationId);
    return row ? toAnalysisRecord(row) : null;
  }
}
