/**
 * Reporting Views
 *
 * Read-only projections over the leads_calientes and
 * estadisticas_conversaciones views. Recomputed on every call.
 */

import { SqliteDatabase } from '../database/connection';
import logger from '../config/logger';
import { PAGINATION } from '../config/constants';
import { DailyStatistics, DailyStatisticsOptions, HotLead, PageOptions } from '../types/conversation.types';
import { DailyStatisticsRow, HotLeadRow } from '../types/database.types';
import { InvalidArgumentError } from '../utils/errors.util';
import { normalizeLimit, normalizeOffset } from '../utils/validation.util';

const DAY_MS = 24 * 60 * 60 * 1000;

export const toHotLead = (row: HotLeadRow): HotLead => ({
  conversationId: row.conversation_id,
  callSid: row.call_sid,
  phoneNumber: row.phone_number,
  startTime: row.start_time,
  durationSeconds: row.duration_seconds,
  summary: row.resumen,
  sentiment: row.sentimiento,
  interestLevel: row.nivel_interes,
  leadGrade: row.calificacion_lead,
  customerInterest: row.interes_cliente,
  nextSteps: row.proximos_pasos,
});

export const toDailyStatistics = (row: DailyStatisticsRow): DailyStatistics => ({
  date: row.fecha,
  totalConversations: row.total_conversaciones,
  averageDurationSeconds: row.duracion_promedio,
  totalMessages: row.total_mensajes ?? 0,
  hotLeads: row.leads_calientes,
  warmLeads: row.leads_tibios,
  coldLeads: row.leads_frios,
  averageInterestLevel: row.interes_promedio,
});

/**
 * First calendar date (UTC, YYYY-MM-DD) inside a window of `days` ending at `now`.
 * Stored timestamps are UTC, so this is the same calendar `fecha` is grouped by.
 */
export const windowStartDate = (days: number, now: Date): string => {
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError('days must be a non-negative integer', { days });
  }
  return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
};

export class ReportingService {
  private log = logger.child({ service: 'reporting' });

  private readonly hotLeadsStmt;
  private readonly statisticsStmt;
  private readonly statisticsSinceStmt;

  constructor(db: SqliteDatabase) {
    this.hotLeadsStmt = db.prepare<[number, number], HotLeadRow>(`
      SELECT * FROM leads_calientes ORDER BY start_time DESC, conversation_id DESC LIMIT ? OFFSET ?
    `);
    this.statisticsStmt = db.prepare<[number, number], DailyStatisticsRow>(`
      SELECT * FROM estadisticas_conversaciones ORDER BY fecha DESC LIMIT ? OFFSET ?
    `);
    this.statisticsSinceStmt = db.prepare<[string, number, number], DailyStatisticsRow>(`
      SELECT * FROM estadisticas_conversaciones WHERE fecha >= ? ORDER BY fecha DESC LIMIT ? OFFSET ?
    `);
  }

  /**
   * Conversations graded 'caliente', most recent call first
   */
  getHotLeads(options: PageOptions = {}): HotLead[] {
    const limit = normalizeLimit(options.limit, PAGINATION.HOT_LEADS, PAGINATION.MAX_LIMIT);
    const offset = normalizeOffset(options.offset);

    const leads = this.hotLeadsStmt.all(limit, offset).map(toHotLead);
    this.log.debug({ limit, offset, count: leads.length }, 'Hot leads fetched');
    return leads;
  }

  /**
   * Per-day totals, newest date first. Dates without conversations are omitted.
   */
  getDailyStatistics(options: DailyStatisticsOptions = {}): DailyStatistics[] {
    const limit = normalizeLimit(options.limit, PAGINATION.MAX_LIMIT, PAGINATION.MAX_LIMIT);
    const offset = normalizeOffset(options.offset);

    const rows =
      options.days === undefined
        ? this.statisticsStmt.all(limit, offset)
        : this.statisticsSinceStmt.all(windowStartDate(options.days, options.now ?? new Date()), limit, offset);

    this.log.debug({ days: options.days, count: rows.length }, 'Daily statistics computed');
    return rows.map(toDailyStatistics);
  }
}
