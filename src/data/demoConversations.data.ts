/**
 * Demo Conversation Data
 *
 * Sample real-estate enquiry calls with their analyses and follow-up
 * scripts, used by the seed script to populate a local database.
 */

import { AnalysisInput, ConversationTranscript } from '../types/conversation.types';

export interface DemoConversation {
  transcript: ConversationTranscript;
  analysis?: AnalysisInput;
  followUpScripts?: string[];
}

export const demoConversations: DemoConversation[] = [
  {
    transcript: {
      callSid: 'CA-demo-0001',
      phoneNumber: '+5215550000001',
      startTime: '2024-03-04T10:00:00',
      endTime: '2024-03-04T10:03:30',
      messages: [
        { role: 'assistant', content: 'Hola, gracias por llamar. ¿En qué le puedo ayudar?', timestamp: '2024-03-04T10:00:02' },
        { role: 'user', content: 'Busco un departamento de dos recámaras en la colonia Roma.', timestamp: '2024-03-04T10:00:10', confidence: 0.93 },
        { role: 'assistant', content: 'Tenemos dos opciones disponibles. ¿Le gustaría agendar una visita?', timestamp: '2024-03-04T10:00:25' },
        { role: 'user', content: 'Sí, este sábado por la mañana.', timestamp: '2024-03-04T10:00:40', confidence: 0.88 },
      ],
    },
    analysis: {
      summary: 'Cliente busca departamento de dos recámaras y agenda visita para el sábado.',
      sentimentDetail: 'positivo - quiere visitar esta semana',
      customerInterest: 'Departamento de dos recámaras en la Roma',
      interestLevel: 9,
      leadGrade: 'caliente',
      nextSteps: ['Confirmar visita del sábado', 'Enviar fichas de las dos opciones'],
      mentionedProperties: ['Depto Roma Norte 2R', 'Depto Roma Sur 2R'],
      keyPoints: ['Presupuesto definido', 'Disponibilidad inmediata'],
    },
    followUpScripts: ['Hola, le confirmamos su visita del sábado a las 10:00 en la colonia Roma.'],
  },
  {
    transcript: {
      callSid: 'CA-demo-0002',
      phoneNumber: '+5215550000002',
      startTime: '2024-03-04T16:20:00',
      endTime: '2024-03-04T16:22:00',
      messages: [
        { role: 'assistant', content: 'Hola, ¿busca rentar o comprar?', timestamp: '2024-03-04T16:20:03' },
        { role: 'user', content: 'Solo estoy viendo precios por ahora.', timestamp: '2024-03-04T16:20:15', confidence: 0.81 },
      ],
    },
    analysis: {
      summary: 'Cliente explorando precios sin fecha de compra.',
      sentiment: 'neutral',
      customerInterest: 'Precios de casas en la zona sur',
      interestLevel: 4,
      leadGrade: 'tibio',
      nextSteps: 'Enviar catálogo por correo',
    },
  },
  {
    transcript: {
      callSid: 'CA-demo-0003',
      phoneNumber: null,
      startTime: '2024-03-05T09:15:00',
      endTime: '2024-03-05T09:15:45',
      messages: [
        { role: 'assistant', content: 'Hola, ¿en qué le puedo ayudar?', timestamp: '2024-03-05T09:15:02' },
        { role: 'user', content: 'Número equivocado, gracias.', timestamp: '2024-03-05T09:15:08', confidence: 0.95 },
      ],
    },
    analysis: {
      summary: 'Llamada equivocada.',
      sentiment: 'neutral',
      interestLevel: 1,
      leadGrade: 'frio',
    },
  },
];
