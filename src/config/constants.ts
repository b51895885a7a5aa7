/**
 * Application Constants
 *
 * Ports, database settings, domain enumerations and response messages
 * used throughout the conversation store.
 */

import { join } from 'path';

// Server Ports
export const PORTS = {
  CONVERSATION_API: Number(process.env.PORT) || 3000,
} as const;

// Database
export const DATABASE = {
  PATH: process.env.CONVERSATION_DB_PATH || join(process.cwd(), 'conversations.db'),
  BUSY_TIMEOUT_MS: Number(process.env.DB_BUSY_TIMEOUT_MS) || 5000,
  IN_MEMORY: ':memory:',
} as const;

// Message roles
export const MESSAGE_ROLES = ['user', 'assistant'] as const;

// Lead grades (caliente = hot, tibio = warm, frio = cold)
export const LEAD_GRADES = ['caliente', 'tibio', 'frio'] as const;

export const LEAD_GRADE = {
  HOT: 'caliente',
  WARM: 'tibio',
  COLD: 'frio',
} as const;

export const ANALYSIS_DEFAULTS = {
  LEAD_GRADE: LEAD_GRADE.WARM,
  MIN_INTEREST_LEVEL: 1,
  MAX_INTEREST_LEVEL: 10,
} as const;

// Paging defaults for listings and reports
export const PAGINATION = {
  RECENT_CONVERSATIONS: 10,
  HOT_LEADS: 10,
  MAX_LIMIT: 500,
} as const;

// Transcript rendering
export const TRANSCRIPT_LABELS = {
  HEADER: 'Conversación del',
  user: 'Usuario',
  assistant: 'Asistente',
  CONFIDENCE: 'confianza',
} as const;

// Error Messages
export const ERROR_MESSAGES = {
  CONVERSATION_NOT_FOUND: 'Conversation not found',
  SCRIPT_NOT_FOUND: 'Follow-up script not found',
  DUPLICATE_CALL_SID: 'A conversation with this call_sid already exists',
  SCRIPT_ALREADY_SENT: 'Follow-up script has already been marked as sent',
  INVALID_ROLE: 'Message role must be "user" or "assistant"',
  INVALID_LEAD_GRADE: 'Lead grade must be "caliente", "tibio" or "frio"',
  INVALID_INTEREST_LEVEL: 'Interest level must be an integer between 1 and 10',
  INVALID_CONFIDENCE: 'Confidence must be a number between 0 and 1',
  INVALID_TIMESTAMP: 'Timestamp must be a valid date or ISO-8601 string',
  END_BEFORE_START: 'End time cannot be earlier than start time',
  MISSING_REQUIRED_FIELDS: 'Missing required fields',
  CONSTRAINT_VIOLATION: 'Database constraint violated',
} as const;

// Success Messages
export const SUCCESS_MESSAGES = {
  CONVERSATION_CREATED: 'Conversation created successfully',
  CONVERSATION_SAVED: 'Conversation saved with all messages',
  CONVERSATION_FINALIZED: 'Conversation finalized successfully',
  CONVERSATION_DELETED: 'Conversation deleted with all related records',
  MESSAGE_APPENDED: 'Message appended successfully',
  ANALYSIS_SAVED: 'Analysis saved successfully',
  SCRIPT_CREATED: 'Follow-up script created successfully',
  SCRIPT_SENT: 'Follow-up script marked as sent',
} as const;

// HTTP Status Codes
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;
