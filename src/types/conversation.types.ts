/**
 * Conversation Type Definitions
 *
 * Domain types for recorded calls, their messages, the lead analysis
 * derived from them, follow-up scripts and the reporting projections.
 */

import { LEAD_GRADES, MESSAGE_ROLES } from '../config/constants';

/** Who produced an utterance */
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Sales-readiness label: caliente (hot), tibio (warm), frio (cold) */
export type LeadGrade = (typeof LEAD_GRADES)[number];

/** Accepted on write; Dates are stored as ISO-8601 strings */
export type Timestamp = Date | string;

/** Conversations can be addressed by surrogate id or by call_sid */
export type ConversationRef = number | string;

/**
 * Conversation - one recorded phone call
 */
export interface Conversation {
  id: number;

  /** Telephony call identifier (unique, immutable) */
  callSid: string;

  /** Caller number, free-form */
  phoneNumber: string | null;

  startTime: string;
  endTime: string | null;
  durationSeconds: number | null;

  /** Denormalized counters; Message rows are the source of truth */
  totalUserMessages: number;
  totalAssistantMessages: number;

  createdAt: string;
}

export interface ConversationFinalization {
  endTime: Timestamp;
  durationSeconds: number;
  userMessages: number;
  assistantMessages: number;
}

/**
 * Message - one utterance within a conversation
 */
export interface Message {
  id: number;
  conversationId: number;
  role: MessageRole;
  content: string;

  /** Speech-to-text confidence in [0, 1]; usually absent for assistant text */
  confidence: number | null;

  /** When the utterance happened (not when the row was written) */
  timestamp: string;

  createdAt: string;
}

export interface MessageInput {
  role: MessageRole;
  content: string;
  timestamp: Timestamp;
  confidence?: number | null;
}

export interface MessageCounts {
  user: number;
  assistant: number;
}

/** Free text, or a list that is persisted as JSON */
export type TextOrList = string | string[];

/**
 * AnalysisInput - what the analysis engine delivers for a conversation
 */
export interface AnalysisInput {
  summary?: string;

  /** Short label such as "positivo"; derived from sentimentDetail when omitted */
  sentiment?: string;
  sentimentDetail?: string;

  customerInterest?: string;

  /** Integer 1-10 */
  interestLevel?: number | null;

  /** Defaults to 'tibio' */
  leadGrade?: LeadGrade;

  nextSteps?: TextOrList;
  mentionedProperties?: TextOrList;
  keyPoints?: TextOrList;
}

export interface AnalysisRecord {
  id: number;
  conversationId: number;
  summary: string | null;
  sentiment: string | null;
  sentimentDetail: string | null;
  customerInterest: string | null;
  interestLevel: number | null;
  leadGrade: string | null;
  nextSteps: string | null;
  mentionedProperties: string | null;
  keyPoints: string | null;
  createdAt: string;
}

/**
 * FollowUpScript - generated outreach text and its delivery status
 */
export interface FollowUpScript {
  id: number;
  conversationId: number;
  scriptContent: string;
  sent: boolean;
  sentAt: string | null;
  createdAt: string;
}

/**
 * ConversationTranscript - a complete call as captured by the telephony pipeline
 */
export interface ConversationTranscript {
  callSid: string;
  phoneNumber?: string | null;
  startTime: Timestamp;
  endTime?: Timestamp | null;

  /** Computed from start and end time when omitted */
  durationSeconds?: number;

  messages: MessageInput[];
}

export interface ConversationDetail {
  conversation: Conversation;
  messages: Message[];
  analysis: AnalysisRecord | null;
  scripts: FollowUpScript[];
}

/**
 * HotLead - row of the hot-lead listing
 */
export interface HotLead {
  conversationId: number;
  callSid: string;
  phoneNumber: string | null;
  startTime: string;
  durationSeconds: number | null;
  summary: string | null;
  sentiment: string | null;
  interestLevel: number | null;
  leadGrade: string;
  customerInterest: string | null;
  nextSteps: string | null;
}

/**
 * DailyStatistics - one calendar day of the statistics view
 */
export interface DailyStatistics {
  /** YYYY-MM-DD */
  date: string;
  totalConversations: number;
  averageDurationSeconds: number | null;
  totalMessages: number;
  hotLeads: number;
  warmLeads: number;
  coldLeads: number;
  averageInterestLevel: number | null;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface DailyStatisticsOptions extends PageOptions {
  /** Only include dates on or after now - days */
  days?: number;
  now?: Date;
}
