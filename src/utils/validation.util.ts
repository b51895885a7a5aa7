/**
 * Input Validation Utilities
 *
 * Enumerations and ranges are checked here, at the application boundary;
 * the persisted columns themselves are plain text and numbers.
 */

import { ANALYSIS_DEFAULTS, ERROR_MESSAGES, LEAD_GRADES, MESSAGE_ROLES } from '../config/constants';
import { LeadGrade, MessageRole, TextOrList, Timestamp } from '../types/conversation.types';
import { InvalidArgumentError } from './errors.util';

export const isMessageRole = (value: unknown): value is MessageRole =>
  typeof value === 'string' && MESSAGE_ROLES.some((role) => role === value);

export const isLeadGrade = (value: unknown): value is LeadGrade =>
  typeof value === 'string' && LEAD_GRADES.some((grade) => grade === value);

export const assertMessageRole = (value: unknown): MessageRole => {
  if (!isMessageRole(value)) {
    throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_ROLE, { role: value });
  }
  return value;
};

export const assertLeadGrade = (value: unknown): LeadGrade => {
  if (!isLeadGrade(value)) {
    throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_LEAD_GRADE, { leadGrade: value });
  }
  return value;
};

export const assertInterestLevel = (value: unknown): number => {
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < ANALYSIS_DEFAULTS.MIN_INTEREST_LEVEL ||
    value > ANALYSIS_DEFAULTS.MAX_INTEREST_LEVEL
  ) {
    throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_INTEREST_LEVEL, { interestLevel: value });
  }
  return value;
};

export const assertConfidence = (value: unknown): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_CONFIDENCE, { confidence: value });
  }
  return value;
};

export const assertNonEmptyText = (value: unknown, field: string): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError(`${ERROR_MESSAGES.MISSING_REQUIRED_FIELDS}: ${field}`, { field });
  }
  return value;
};

export const assertNonNegativeInteger = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative integer`, { field, value });
  }
  return value;
};

export const assertNonNegativeNumber = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative number`, { field, value });
  }
  return value;
};

// YYYY-MM-DD[T ]HH:MM[:SS[.fff]][Z|±HH:MM]
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:\d{2})?$/i;

const parseIsoTimestamp = (value: string): Date | null => {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, date, hoursMinutes, seconds = '00', fraction = '', zone = 'Z'] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  return new Date(`${date}T${hoursMinutes}:${seconds}.${millis}${zone.toUpperCase()}`);
};

/**
 * Normalize a timestamp for storage
 *
 * Every value is stored as a fixed-width UTC ISO-8601 string so that text
 * ordering is chronological and DATE() groups by UTC calendar day.
 * Strings must be ISO-8601; without an offset they are read as UTC.
 */
export const toStoredTimestamp = (value: Timestamp, field = 'timestamp'): string => {
  const date = value instanceof Date ? value : typeof value === 'string' ? parseIsoTimestamp(value) : null;

  if (date === null || Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_TIMESTAMP, { field, value });
  }

  return date.toISOString();
};

/** Lists are persisted as JSON text; free text as-is */
export const serializeTextOrList = (value: TextOrList | undefined): string | null => {
  if (value === undefined) return null;
  return Array.isArray(value) ? JSON.stringify(value) : value;
};

/**
 * Short sentiment label from a detailed description
 * "positivo - el cliente quiere agendar visita" -> "positivo"
 */
export const deriveSentimentLabel = (detail: string): string => {
  const separator = detail.indexOf('-');
  return separator === -1 ? detail.trim() : detail.slice(0, separator).trim();
};

/** Clamp a page size to something the reports can serve */
export const normalizeLimit = (limit: number | undefined, fallback: number, max: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) return fallback;
  return Math.min(Math.max(Math.trunc(limit), 1), max);
};

export const normalizeOffset = (offset: number | undefined): number => {
  if (offset === undefined || !Number.isFinite(offset)) return 0;
  return Math.max(Math.trunc(offset), 0);
};
