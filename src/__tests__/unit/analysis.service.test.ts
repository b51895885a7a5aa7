/**
 * Analysis Record Tests
 */

import { createTestStore, countRows, TestStore } from '../helpers/test-db';
import { createTestAnalysis, createTestConversation } from '../helpers/test-data';
import { AnalysisInput } from '../../types/conversation.types';
import { toAnalysisValues } from '../../services/analysis.service';
import { InvalidArgumentError, NotFoundError } from '../../utils/errors.util';

describe('AnalysisService', () => {
  let store: TestStore;
  let conversationId: number;

  beforeEach(() => {
    store = createTestStore();
    conversationId = createTestConversation(store.services);
  });

  afterEach(() => {
    store.db.close();
  });

  describe('upsert', () => {
    test('should store an analysis readable with get', () => {
      const analysisId = store.services.analyses.upsert(conversationId, createTestAnalysis());

      expect(store.services.analyses.get(conversationId)).toMatchObject({
        id: analysisId,
        conversationId,
        summary: 'Cliente interesado en una casa con jardín',
        sentiment: 'positivo',
        sentimentDetail: null,
        customerInterest: 'Casa de tres recámaras',
        interestLevel: 8,
        leadGrade: 'caliente',
        nextSteps: 'Agendar visita',
        mentionedProperties: null,
        keyPoints: null,
      });
    });

    test('should replace the previous analysis in place', () => {
      const firstId = store.services.analyses.upsert(conversationId, createTestAnalysis());
      const secondId = store.services.analyses.upsert(
        conversationId,
        createTestAnalysis({ leadGrade: 'frio', interestLevel: 2, summary: 'Ya compró en otro lado' })
      );

      expect(secondId).toBe(firstId);
      expect(countRows(store.db, 'analisis_conversaciones')).toBe(1);
      expect(store.services.analyses.get(conversationId)).toMatchObject({
        leadGrade: 'frio',
        interestLevel: 2,
        summary: 'Ya compró en otro lado',
      });
    });

    test('should move the conversation out of hot leads when regraded', () => {
      store.services.analyses.upsert(conversationId, createTestAnalysis());
      expect(store.services.reporting.getHotLeads()).toHaveLength(1);

      store.services.analyses.upsert(conversationId, createTestAnalysis({ leadGrade: 'tibio' }));
      expect(store.services.reporting.getHotLeads()).toEqual([]);
    });

    test('should default the lead grade to tibio', () => {
      store.services.analyses.upsert(conversationId, { summary: 'Sin calificación' });

      expect(store.services.analyses.get(conversationId)?.leadGrade).toBe('tibio');
    });

    test('should persist list fields as JSON text', () => {
      store.services.analyses.upsert(
        conversationId,
        createTestAnalysis({
          nextSteps: ['Llamar el lunes', 'Enviar fotos'],
          mentionedProperties: ['Casa Coyoacán'],
          keyPoints: ['Crédito aprobado'],
        })
      );

      const analysis = store.services.analyses.get(conversationId);
      expect(analysis?.nextSteps).toBe('["Llamar el lunes","Enviar fotos"]');
      expect(analysis?.mentionedProperties).toBe('["Casa Coyoacán"]');
      expect(analysis?.keyPoints).toBe('["Crédito aprobado"]');
    });

    test('should accept a null interest level', () => {
      store.services.analyses.upsert(conversationId, createTestAnalysis({ interestLevel: null }));

      expect(store.services.analyses.get(conversationId)?.interestLevel).toBeNull();
    });

    test.each([0, 11, 7.5])('should reject interest level %p', (interestLevel) => {
      expect(() => store.services.analyses.upsert(conversationId, createTestAnalysis({ interestLevel }))).toThrow(
        InvalidArgumentError
      );
      expect(countRows(store.db, 'analisis_conversaciones')).toBe(0);
    });

    test('should reject an unknown lead grade', () => {
      const input: AnalysisInput = JSON.parse('{"summary":"Muy interesado","leadGrade":"hirviendo"}');

      expect(() => store.services.analyses.upsert(conversationId, input)).toThrow(InvalidArgumentError);
    });

    test('should fail with NotFound when the conversation is absent', () => {
      expect(() => store.services.analyses.upsert(999, createTestAnalysis())).toThrow(NotFoundError);
      expect(countRows(store.db, 'analisis_conversaciones')).toBe(0);
    });
  });

  describe('get', () => {
    test('should return null when no analysis exists', () => {
      expect(store.services.analyses.get(conversationId)).toBeNull();
    });
  });

  describe('toAnalysisValues', () => {
    test('should derive the sentiment label from the detail', () => {
      const [, sentiment, detail] = toAnalysisValues({ sentimentDetail: 'positivo - quiere visitar pronto' });

      expect(sentiment).toBe('positivo');
      expect(detail).toBe('positivo - quiere visitar pronto');
    });

    test('should prefer an explicit sentiment over the detail', () => {
      const [, sentiment] = toAnalysisValues({ sentiment: 'neutral', sentimentDetail: 'positivo - algo' });

      expect(sentiment).toBe('neutral');
    });

    test('should map an empty input to nulls and the default grade', () => {
      expect(toAnalysisValues({})).toEqual([null, null, null, null, null, 'tibio', null, null, null]);
    });
  });
});
