/**
 * Print the hot-lead listing, daily statistics and recent calls
 *
 * Usage:
 *   npm run reports            # last 7 days of statistics
 *   npm run reports -- 30      # last 30 days
 */

import dotenv from 'dotenv';
dotenv.config();

import { withDatabase } from '../src/database/connection';
import { createServices } from '../src/services';

const DEFAULT_DAYS = 7;

function printReports(days: number) {
  withDatabase((db) => {
    const { reporting, conversations } = createServices(db);

    console.log('\n=== Hot Leads ===\n');
    for (const lead of reporting.getHotLeads()) {
      console.log(`🔥 ${lead.callSid}  ${lead.phoneNumber ?? 'unknown'}  ${lead.startTime}`);
      console.log(`   Interest: ${lead.interestLevel ?? '-'}/10  Sentiment: ${lead.sentiment ?? '-'}`);
      console.log(`   ${lead.summary ?? ''}`);
      console.log('');
    }

    console.log(`=== Daily Statistics (last ${days} days) ===\n`);
    console.table(reporting.getDailyStatistics({ days }));

    console.log('\n=== Recent Conversations ===\n');
    conversations.listRecent().forEach((conversation, index) => {
      const messages = conversation.totalUserMessages + conversation.totalAssistantMessages;
      console.log(`${index + 1}. ${conversation.callSid}`);
      console.log(`   📅 ${conversation.startTime}`);
      console.log(`   💬 ${messages} messages`);
    });
  });
}

const requestedDays = Number(process.argv[2]);
printReports(Number.isInteger(requestedDays) && requestedDays >= 0 ? requestedDays : DEFAULT_DAYS);
