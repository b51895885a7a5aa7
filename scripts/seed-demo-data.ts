/**
 * Seed Script: Populate the conversation database with demo calls
 *
 * Each demo call is saved with its messages, then its analysis and
 * follow-up scripts. Calls whose call_sid already exists are skipped.
 */

import dotenv from 'dotenv';
dotenv.config();

import { withDatabase } from '../src/database/connection';
import { createServices } from '../src/services';
import { demoConversations } from '../src/data/demoConversations.data';
import { DuplicateKeyError } from '../src/utils/errors.util';
import logger from '../src/config/logger';

function seedDemoData() {
  logger.info(`Seeding ${demoConversations.length} demo conversations`);

  const summary = withDatabase((db) => {
    const services = createServices(db);
    let inserted = 0;
    let skipped = 0;

    for (const demo of demoConversations) {
      try {
        const conversationId = services.archive.saveCompleteConversation(demo.transcript);

        if (demo.analysis) {
          services.analyses.upsert(conversationId, demo.analysis);
        }
        for (const script of demo.followUpScripts ?? []) {
          services.scripts.create(conversationId, script);
        }

        inserted++;
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          logger.debug({ callSid: demo.transcript.callSid }, 'Conversation already exists, skipping');
          skipped++;
        } else {
          throw error;
        }
      }
    }

    return { inserted, skipped, hotLeads: services.reporting.getHotLeads().length };
  });

  logger.info(summary, 'Database seeding complete');
}

try {
  seedDemoData();
  logger.info('Seed script completed successfully');
} catch (error) {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Seed script failed');
  process.exitCode = 1;
}
