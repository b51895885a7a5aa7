/**
 * Conversation Store Tests
 */

import { createTestStore, countRows, TestStore } from '../helpers/test-db';
import { createTestAnalysis, createTestConversation, TEST_CALLS } from '../helpers/test-data';
import { DuplicateKeyError, InvalidArgumentError, NotFoundError } from '../../utils/errors.util';

describe('ConversationService', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.db.close();
  });

  describe('create', () => {
    test('should create a conversation with default counters', () => {
      const id = createTestConversation(store.services);
      const conversation = store.services.conversations.getById(id);

      expect(conversation).toMatchObject({
        id,
        callSid: TEST_CALLS.CALL_SID,
        phoneNumber: TEST_CALLS.PHONE,
        startTime: TEST_CALLS.STORED_START,
        endTime: null,
        durationSeconds: null,
        totalUserMessages: 0,
        totalAssistantMessages: 0,
      });
      expect(typeof conversation.createdAt).toBe('string');
    });

    test('should return the same record by call_sid and by id', () => {
      const id = createTestConversation(store.services);

      expect(store.services.conversations.get(TEST_CALLS.CALL_SID)).toEqual(store.services.conversations.get(id));
    });

    test('should assign increasing ids', () => {
      const first = createTestConversation(store.services, 'CA-a');
      const second = createTestConversation(store.services, 'CA-b');

      expect(second).toBeGreaterThan(first);
    });

    test('should reject a duplicate call_sid without adding a row', () => {
      createTestConversation(store.services);

      expect(() => createTestConversation(store.services)).toThrow(DuplicateKeyError);
      expect(countRows(store.db, 'conversaciones')).toBe(1);
    });

    test('should store Date start times as ISO strings', () => {
      const id = store.services.conversations.create('CA-date', null, new Date('2024-01-01T10:00:00Z'));

      expect(store.services.conversations.getById(id).startTime).toBe('2024-01-01T10:00:00.000Z');
    });

    test('should store a blank phone number as null', () => {
      const id = store.services.conversations.create('CA-blank', '   ', TEST_CALLS.START);

      expect(store.services.conversations.getById(id).phoneNumber).toBeNull();
    });

    test('should reject an empty call_sid', () => {
      expect(() => store.services.conversations.create('  ', null, TEST_CALLS.START)).toThrow(InvalidArgumentError);
    });

    test('should reject an unparseable start time', () => {
      expect(() => store.services.conversations.create('CA-bad', null, 'not-a-date')).toThrow(InvalidArgumentError);
    });
  });

  describe('finalize', () => {
    test('should set end time, duration and counts', () => {
      const id = createTestConversation(store.services);

      store.services.conversations.finalize(id, {
        endTime: TEST_CALLS.END,
        durationSeconds: 120.5,
        userMessages: 3,
        assistantMessages: 2,
      });

      expect(store.services.conversations.getById(id)).toMatchObject({
        endTime: TEST_CALLS.STORED_END,
        durationSeconds: 120.5,
        totalUserMessages: 3,
        totalAssistantMessages: 2,
      });
    });

    test('should be idempotent for identical values and overwrite otherwise', () => {
      const id = createTestConversation(store.services);
      const finalization = { endTime: TEST_CALLS.END, durationSeconds: 120, userMessages: 1, assistantMessages: 1 };

      store.services.conversations.finalize(id, finalization);
      const first = store.services.conversations.getById(id);
      store.services.conversations.finalize(id, finalization);
      expect(store.services.conversations.getById(id)).toEqual(first);

      store.services.conversations.finalize(id, { ...finalization, durationSeconds: 130 });
      expect(store.services.conversations.getById(id).durationSeconds).toBe(130);
    });

    test('should fail with NotFound for an unknown conversation', () => {
      expect(() =>
        store.services.conversations.finalize(999, {
          endTime: TEST_CALLS.END,
          durationSeconds: 1,
          userMessages: 0,
          assistantMessages: 0,
        })
      ).toThrow(NotFoundError);
    });

    test('should reject an end time before the start time', () => {
      const id = createTestConversation(store.services);

      expect(() =>
        store.services.conversations.finalize(id, {
          endTime: '2024-01-01T09:59:00',
          durationSeconds: 0,
          userMessages: 0,
          assistantMessages: 0,
        })
      ).toThrow(InvalidArgumentError);
      expect(store.services.conversations.getById(id).endTime).toBeNull();
    });

    test('should reject negative or fractional counts', () => {
      const id = createTestConversation(store.services);

      expect(() =>
        store.services.conversations.finalize(id, {
          endTime: TEST_CALLS.END,
          durationSeconds: 10,
          userMessages: -1,
          assistantMessages: 0,
        })
      ).toThrow(InvalidArgumentError);
      expect(() =>
        store.services.conversations.finalize(id, {
          endTime: TEST_CALLS.END,
          durationSeconds: 10,
          userMessages: 1,
          assistantMessages: 1.5,
        })
      ).toThrow(InvalidArgumentError);
    });
  });

  describe('get', () => {
    test('should fail with NotFound for unknown id or call_sid', () => {
      expect(() => store.services.conversations.get(42)).toThrow(NotFoundError);
      expect(() => store.services.conversations.get('CA-missing')).toThrow(NotFoundError);
    });

    test('should return null from find for unknown refs', () => {
      expect(store.services.conversations.find(42)).toBeNull();
      expect(store.services.conversations.find('CA-missing')).toBeNull();
    });
  });

  describe('delete', () => {
    test('should cascade to messages, analysis and scripts', () => {
      const id = createTestConversation(store.services);
      store.services.messages.append(id, { role: 'user', content: 'Hola', timestamp: '2024-01-01T10:00:05' });
      store.services.analyses.upsert(id, createTestAnalysis());
      store.services.scripts.create(id, 'Seguimiento');

      store.services.conversations.delete(id);

      expect(store.services.conversations.findById(id)).toBeNull();
      expect(store.services.messages.getMessages(id)).toEqual([]);
      expect(store.services.analyses.get(id)).toBeNull();
      expect(store.services.scripts.listByConversation(id)).toEqual([]);
      expect(store.services.scripts.listPending()).toEqual([]);
      expect(countRows(store.db, 'mensajes')).toBe(0);
      expect(countRows(store.db, 'analisis_conversaciones')).toBe(0);
      expect(countRows(store.db, 'scripts_seguimiento')).toBe(0);
    });

    test('should leave other conversations untouched', () => {
      const keep = createTestConversation(store.services, 'CA-keep');
      const remove = createTestConversation(store.services, 'CA-remove');
      store.services.messages.append(keep, { role: 'user', content: 'Sigo aquí', timestamp: '2024-01-01T10:00:05' });

      store.services.conversations.delete(remove);

      expect(store.services.messages.getMessages(keep)).toHaveLength(1);
    });

    test('should fail with NotFound for an unknown conversation', () => {
      expect(() => store.services.conversations.delete(7)).toThrow(NotFoundError);
    });
  });

  describe('listRecent', () => {
    test('should order by start time, newest first, and honour limit', () => {
      createTestConversation(store.services, 'CA-old', '2024-01-01T08:00:00');
      createTestConversation(store.services, 'CA-new', '2024-01-03T08:00:00');
      createTestConversation(store.services, 'CA-mid', '2024-01-02T08:00:00');

      const recent = store.services.conversations.listRecent({ limit: 2 });

      expect(recent.map((conversation) => conversation.callSid)).toEqual(['CA-new', 'CA-mid']);
    });
  });

  describe('countMessages', () => {
    test('should count message rows per role', () => {
      const id = createTestConversation(store.services);
      store.services.messages.append(id, { role: 'user', content: 'Hola', timestamp: '2024-01-01T10:00:05' });
      store.services.messages.append(id, { role: 'user', content: 'Otra vez', timestamp: '2024-01-01T10:00:09' });

      expect(store.services.conversations.countMessages(id)).toEqual({ user: 2, assistant: 0 });
    });
  });

  describe('syncMessageCounts', () => {
    test('should repair counters from the message rows', () => {
      const id = createTestConversation(store.services);
      store.services.messages.append(id, { role: 'user', content: 'Hola', timestamp: '2024-01-01T10:00:05' });

      // Row written behind the service's back
      store.db
        .prepare('INSERT INTO mensajes (conversation_id, role, content, timestamp) VALUES (?, ?, ?, ?)')
        .run(id, 'assistant', 'Buenos días', '2024-01-01T10:00:06');

      expect(store.services.conversations.getById(id).totalAssistantMessages).toBe(0);

      const counts = store.services.conversations.syncMessageCounts(id);

      expect(counts).toEqual({ user: 1, assistant: 1 });
      expect(store.services.conversations.getById(id)).toMatchObject({
        totalUserMessages: 1,
        totalAssistantMessages: 1,
      });
    });

    test('should fail with NotFound for an unknown conversation', () => {
      expect(() => store.services.conversations.syncMessageCounts(404)).toThrow(NotFoundError);
    });
  });
});
