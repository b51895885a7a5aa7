/**
 * Conversation Archive
 *
 * Whole-call operations built on the individual stores: saving a captured
 * call in one transaction, reading it back with all owned records, and
 * rendering the plain-text transcript the analysis engine consumes.
 */

import { SqliteDatabase, runImmediate } from '../database/connection';
import logger from '../config/logger';
import { TRANSCRIPT_LABELS } from '../config/constants';
import {
  ConversationDetail,
  ConversationRef,
  ConversationTranscript,
  Message,
} from '../types/conversation.types';
import { toStoredTimestamp } from '../utils/validation.util';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import { ConversationService } from './conversation.service';
import { MessageService } from './message.service';
import { AnalysisService } from './analysis.service';
import { FollowUpScriptService } from './followUpScript.service';
import errorHandler from './errorHandler.service';

export interface ArchiveDependencies {
  conversations: ConversationService;
  messages: MessageService;
  analyses: AnalysisService;
  scripts: FollowUpScriptService;
}

export const formatTranscriptLine = (message: Pick<Message, 'role' | 'content' | 'confidence'>): string => {
  const speaker = TRANSCRIPT_LABELS[message.role];
  const confidence = message.confidence
    ? ` (${TRANSCRIPT_LABELS.CONFIDENCE}: ${message.confidence.toFixed(2)})`
    : '';
  return `${speaker}: ${message.content}${confidence}`;
};

export class ConversationArchiveService {
  private log = logger.child({ service: 'conversation-archive' });

  constructor(
    private readonly db: SqliteDatabase,
    private readonly deps: ArchiveDependencies
  ) {}

  /**
   * Persist a complete call: conversation, every message and (when the call
   * has ended) the finalization. Any failure rolls everything back.
   */
  saveCompleteConversation(transcript: ConversationTranscript): number {
    const context = { operation: 'saveCompleteConversation', callSid: transcript.callSid };

    return errorHandler.guard('conversation', context, () => {
      const conversationId = runImmediate(this.db, () => {
        const id = this.deps.conversations.create(transcript.callSid, transcript.phoneNumber, transcript.startTime);

        let userMessages = 0;
        let assistantMessages = 0;
        for (const message of transcript.messages) {
          this.deps.messages.append(id, message);
          if (message.role === 'user') userMessages++;
          else assistantMessages++;
        }

        if (transcript.endTime !== undefined && transcript.endTime !== null) {
          const start = Date.parse(toStoredTimestamp(transcript.startTime, 'startTime'));
          const end = Date.parse(toStoredTimestamp(transcript.endTime, 'endTime'));

          this.deps.conversations.finalize(id, {
            endTime: transcript.endTime,
            durationSeconds: transcript.durationSeconds ?? Math.max(0, (end - start) / 1000),
            userMessages,
            assistantMessages,
          });
        }

        return id;
      });

      this.log.info(
        {
          conversationId,
          callSid: transcript.callSid,
          phoneNumber: maskPhoneNumber(transcript.phoneNumber),
          messages: transcript.messages.length,
        },
        'Conversation saved with all messages'
      );

      return conversationId;
    });
  }

  /**
   * Conversation with its messages, analysis and follow-up scripts
   */
  getConversationDetail(ref: ConversationRef): ConversationDetail {
    const conversation = this.deps.conversations.get(ref);

    return {
      conversation,
      messages: this.deps.messages.getMessages(conversation.id),
      analysis: this.deps.analyses.get(conversation.id),
      scripts: this.deps.scripts.listByConversation(conversation.id),
    };
  }

  /**
   * Plain-text transcript, one line per utterance
   */
  renderTranscript(ref: ConversationRef): string {
    const conversation = this.deps.conversations.get(ref);
    const lines = this.deps.messages.getMessages(conversation.id).map(formatTranscriptLine);

    return `${TRANSCRIPT_LABELS.HEADER} ${conversation.startTime}\n\n${lines.map((line) => `${line}\n`).join('')}`;
  }
}
