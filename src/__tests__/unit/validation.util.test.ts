/**
 * Validation, parsing and phone number helper tests
 */

import {
  assertConfidence,
  assertInterestLevel,
  deriveSentimentLabel,
  normalizeLimit,
  normalizeOffset,
  serializeTextOrList,
  toStoredTimestamp,
} from '../../utils/validation.util';
import { cleanPhoneNumber, maskPhoneNumber } from '../../utils/phoneNumber.util';
import {
  parseAnalysisInput,
  parseConversationRef,
  parseId,
  parseMessageInput,
  parseQueryInt,
} from '../../servers/requestParsers';
import { InvalidArgumentError } from '../../utils/errors.util';

describe('validation utilities', () => {
  test('toStoredTimestamp stores every accepted value as fixed-width UTC ISO text', () => {
    expect(toStoredTimestamp(' 2024-01-01T10:00:00 ')).toBe('2024-01-01T10:00:00.000Z');
    expect(toStoredTimestamp('2024-01-01 10:00')).toBe('2024-01-01T10:00:00.000Z');
    expect(toStoredTimestamp('2024-01-01T10:00:05.5Z')).toBe('2024-01-01T10:00:05.500Z');
    expect(toStoredTimestamp('2024-01-01T10:00:05.123456Z')).toBe('2024-01-01T10:00:05.123Z');
    expect(toStoredTimestamp('2024-01-01T11:00:00+02:00')).toBe('2024-01-01T09:00:00.000Z');
    expect(toStoredTimestamp('2024-01-01T23:30:00-03:00')).toBe('2024-01-02T02:30:00.000Z');
    expect(toStoredTimestamp(new Date('2024-01-01T10:00:00Z'))).toBe('2024-01-01T10:00:00.000Z');
  });

  test('toStoredTimestamp rejects anything but ISO-8601 date-times', () => {
    expect(() => toStoredTimestamp('mañana')).toThrow(InvalidArgumentError);
    expect(() => toStoredTimestamp('January 1, 2024 10:00:00')).toThrow(InvalidArgumentError);
    expect(() => toStoredTimestamp('2024-01-01')).toThrow(InvalidArgumentError);
    expect(() => toStoredTimestamp('1704103200000')).toThrow(InvalidArgumentError);
    expect(() => toStoredTimestamp(new Date('invalid'))).toThrow(InvalidArgumentError);
  });

  test('assertInterestLevel accepts integers from 1 to 10', () => {
    expect(assertInterestLevel(1)).toBe(1);
    expect(assertInterestLevel(10)).toBe(10);
    expect(() => assertInterestLevel(0)).toThrow(InvalidArgumentError);
    expect(() => assertInterestLevel('5')).toThrow(InvalidArgumentError);
  });

  test('assertConfidence accepts the closed unit interval', () => {
    expect(assertConfidence(0)).toBe(0);
    expect(assertConfidence(1)).toBe(1);
    expect(() => assertConfidence(-0.1)).toThrow(InvalidArgumentError);
    expect(() => assertConfidence(Number.NaN)).toThrow(InvalidArgumentError);
  });

  test('serializeTextOrList stores lists as JSON', () => {
    expect(serializeTextOrList(['a', 'b'])).toBe('["a","b"]');
    expect(serializeTextOrList('texto')).toBe('texto');
    expect(serializeTextOrList(undefined)).toBeNull();
  });

  test('deriveSentimentLabel takes the text before the first dash', () => {
    expect(deriveSentimentLabel('negativo - no le gustó el precio')).toBe('negativo');
    expect(deriveSentimentLabel(' neutral ')).toBe('neutral');
  });

  test('normalizeLimit and normalizeOffset clamp page options', () => {
    expect(normalizeLimit(undefined, 10, 500)).toBe(10);
    expect(normalizeLimit(0, 10, 500)).toBe(1);
    expect(normalizeLimit(9999, 10, 500)).toBe(500);
    expect(normalizeOffset(-3)).toBe(0);
    expect(normalizeOffset(4.7)).toBe(4);
  });
});

describe('phone number utilities', () => {
  test('cleanPhoneNumber trims and nulls blanks', () => {
    expect(cleanPhoneNumber(' +15550001111 ')).toBe('+15550001111');
    expect(cleanPhoneNumber('')).toBeNull();
    expect(cleanPhoneNumber(null)).toBeNull();
  });

  test('maskPhoneNumber hides the last four digits', () => {
    expect(maskPhoneNumber('+15550001111')).toBe('+1555000****');
    expect(maskPhoneNumber('123')).toBe('****');
    expect(maskPhoneNumber(null)).toBe('****');
  });
});

describe('request parsers', () => {
  test('parseId accepts digits only', () => {
    expect(parseId('12')).toBe(12);
    expect(() => parseId('12a')).toThrow(InvalidArgumentError);
  });

  test('parseConversationRef distinguishes ids from call_sids', () => {
    expect(parseConversationRef('42')).toBe(42);
    expect(parseConversationRef('CA-42')).toBe('CA-42');
  });

  test('parseQueryInt reads optional non-negative integers', () => {
    expect(parseQueryInt(undefined, 'limit')).toBeUndefined();
    expect(parseQueryInt('5', 'limit')).toBe(5);
    expect(() => parseQueryInt('-1', 'limit')).toThrow(InvalidArgumentError);
  });

  test('parseMessageInput validates role and required fields', () => {
    expect(parseMessageInput({ role: 'user', content: 'Hola', timestamp: '2024-01-01T10:00:00' })).toEqual({
      role: 'user',
      content: 'Hola',
      timestamp: '2024-01-01T10:00:00',
      confidence: null,
    });
    expect(() => parseMessageInput({ role: 'bot', content: 'Hola', timestamp: '2024-01-01T10:00:00' })).toThrow(
      InvalidArgumentError
    );
    expect(() => parseMessageInput({ role: 'user', timestamp: '2024-01-01T10:00:00' })).toThrow(
      'Missing required fields: content'
    );
  });

  test('parseAnalysisInput rejects non-string list items', () => {
    expect(parseAnalysisInput({ leadGrade: 'frio', nextSteps: ['Llamar'] })).toMatchObject({
      leadGrade: 'frio',
      nextSteps: ['Llamar'],
    });
    expect(() => parseAnalysisInput({ keyPoints: [1, 2] })).toThrow(InvalidArgumentError);
  });
});
