import { SqliteDatabase } from '../database/connection';
import { ConversationService } from './conversation.service';
import { MessageService } from './message.service';
import { AnalysisService } from './analysis.service';
import { FollowUpScriptService } from './followUpScript.service';
import { ReportingService } from './reporting.service';
import { ConversationArchiveService } from './conversationArchive.service';

export interface ConversationServices {
  conversations: ConversationService;
  messages: MessageService;
  analyses: AnalysisService;
  scripts: FollowUpScriptService;
  reporting: ReportingService;
  archive: ConversationArchiveService;
}

/**
 * Build every store over one connection. The connection stays owned by the caller.
 */
export const createServices = (db: SqliteDatabase): ConversationServices => {
  const conversations = new ConversationService(db);
  const messages = new MessageService(db);
  const analyses = new AnalysisService(db);
  const scripts = new FollowUpScriptService(db);

  return {
    conversations,
    messages,
    analyses,
    scripts,
    reporting: new ReportingService(db),
    archive: new ConversationArchiveService(db, { conversations, messages, analyses, scripts }),
  };
};

export { ConversationService, MessageService, AnalysisService, FollowUpScriptService, ReportingService, ConversationArchiveService };
export { openDatabase, withDatabase } from '../database/connection';
export * from '../types/conversation.types';
export * from '../utils/errors.util';
