#!/usr/bin/env node

import { ConfigLoader } from '../utils/config';
import { MAX_PAGES, WEBSITE } from '../utils/constants';
import { StorageFault } from '../utils/errors';
import { createDatabaseFromEnv } from '../utils/mysql-config';
import { formatGrant, formatSummary, harvest } from './harvest';

async function runHarvest(): Promise<void> {
  console.log(`🚀 Starting grant harvest for website: ${WEBSITE}`);

  const website = ConfigLoader.getWebsiteConfig(WEBSITE);
  const db = createDatabaseFromEnv();
  try {
    await db.connect();
  } catch (error) {
    await db.disconnect();
    throw new StorageFault('Could not connect to MySQL', error);
  }

  const { crawl, stored } = await harvest({ website, db, maxPages: MAX_PAGES });

  for (const grant of stored) {
    console.log(formatGrant(grant));
  }

  console.log(`📊 ${formatSummary(crawl)}`);
  if (crawl.fetchFailure) {
    console.warn(`Crawl stopped early: ${crawl.fetchFailure.message}`);
  }
}

if (require.main === module) {
  runHarvest()
    .then(() => {
      console.log('🎉 Grant harvest completed');
      process.exit(0);
    })
    .catch((error) => {
      if (error instanceof StorageFault) {
        console.error('💥 Storage fault, aborting run:', error.message, error.cause ?? '');
      } else {
        console.error('💥 Grant harvest failed:', error);
      }
      process.exit(1);
    });
}

export { runHarvest };
