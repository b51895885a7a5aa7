/**
 * Request body and query parsing for the conversation API
 *
 * JSON bodies arrive untyped; these helpers narrow them into the store's
 * input types and reject anything else with InvalidArgumentError.
 */

import { ERROR_MESSAGES } from '../config/constants';
import {
  AnalysisInput,
  ConversationFinalization,
  ConversationRef,
  ConversationTranscript,
  MessageInput,
  TextOrList,
} from '../types/conversation.types';
import { InvalidArgumentError } from '../utils/errors.util';
import { assertLeadGrade, assertMessageRole } from '../utils/validation.util';

export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const requireBody = (body: unknown): JsonObject => {
  if (!isJsonObject(body)) {
    throw new InvalidArgumentError('Request body must be a JSON object');
  }
  return body;
};

const requireString = (body: JsonObject, key: string): string => {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError(`${ERROR_MESSAGES.MISSING_REQUIRED_FIELDS}: ${key}`, { field: key });
  }
  return value;
};

const optionalString = (body: JsonObject, key: string): string | undefined => {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${key} must be a string`, { field: key });
  }
  return value;
};

const requireNumber = (body: JsonObject, key: string): number => {
  const value = body[key];
  if (typeof value !== 'number') {
    throw new InvalidArgumentError(`${ERROR_MESSAGES.MISSING_REQUIRED_FIELDS}: ${key}`, { field: key });
  }
  return value;
};

const optionalNumber = (body: JsonObject, key: string): number | undefined => {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new InvalidArgumentError(`${key} must be a number`, { field: key });
  }
  return value;
};

const optionalTextOrList = (body: JsonObject, key: string): TextOrList | undefined => {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new InvalidArgumentError(`${key} must be a string or a list of strings`, { field: key });
};

/**
 * Path ids are positive integers
 */
export const parseId = (raw: string, field = 'id'): number => {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(`${field} must be a positive integer`, { [field]: raw });
  }
  return Number(raw);
};

/**
 * Digits address a conversation by id, anything else by call_sid
 */
export const parseConversationRef = (raw: string): ConversationRef => (/^\d+$/.test(raw) ? Number(raw) : raw);

export const parseQueryInt = (value: unknown, field: string): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`${field} must be a non-negative integer`, { field, value });
  }
  return Number(value);
};

export const parseMessageInput = (raw: unknown): MessageInput => {
  const body = requireBody(raw);
  return {
    role: assertMessageRole(body.role),
    content: requireString(body, 'content'),
    timestamp: requireString(body, 'timestamp'),
    confidence: optionalNumber(body, 'confidence') ?? null,
  };
};

export const parseFinalization = (raw: unknown): ConversationFinalization => {
  const body = requireBody(raw);
  return {
    endTime: requireString(body, 'endTime'),
    durationSeconds: requireNumber(body, 'durationSeconds'),
    userMessages: requireNumber(body, 'userMessages'),
    assistantMessages: requireNumber(body, 'assistantMessages'),
  };
};

export const parseAnalysisInput = (raw: unknown): AnalysisInput => {
  const body = requireBody(raw);
  const leadGrade = body.leadGrade;
  return {
    summary: optionalString(body, 'summary'),
    sentiment: optionalString(body, 'sentiment'),
    sentimentDetail: optionalString(body, 'sentimentDetail'),
    customerInterest: optionalString(body, 'customerInterest'),
    interestLevel: optionalNumber(body, 'interestLevel'),
    leadGrade: leadGrade === undefined || leadGrade === null ? undefined : assertLeadGrade(leadGrade),
    nextSteps: optionalTextOrList(body, 'nextSteps'),
    mentionedProperties: optionalTextOrList(body, 'mentionedProperties'),
    keyPoints: optionalTextOrList(body, 'keyPoints'),
  };
};

export const parseTranscript = (body: JsonObject): ConversationTranscript => {
  const messages = body.messages;
  if (!Array.isArray(messages)) {
    throw new InvalidArgumentError('messages must be a list', { field: 'messages' });
  }

  return {
    callSid: requireString(body, 'callSid'),
    phoneNumber: optionalString(body, 'phoneNumber') ?? null,
    startTime: requireString(body, 'startTime'),
    endTime: optionalString(body, 'endTime') ?? null,
    durationSeconds: optionalNumber(body, 'durationSeconds'),
    messages: messages.map(parseMessageInput),
  };
};
