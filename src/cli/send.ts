#!/usr/bin/env node

/**
 * bellhop-send
 * Pushes one notification to a Bellhop server from the command line
 */

import { loadCliConfig } from './config.js';
import { USAGE, UsageError, parseSendArgs } from './args.js';
import { HttpNotificationClient } from '../notifications/http-client.js';

async function main() {
  const config = await loadCliConfig();
  const args = parseSendArgs(process.argv.slice(2), config);

  const client = new HttpNotificationClient(args.host);
  await client.publish({ title: args.title, message: args.message });
  console.log('Notification sent successfully');
}

main().catch((error) => {
  if (error instanceof UsageError) {
    console.log(USAGE);
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
});
