#!/usr/bin/env tsx
/**
 * Faculty Contact Pipeline
 *
 * Builds contact records for an institution's research-active faculty and
 * writes them to the output directory.
 *
 * Usage:
 *   npm run pipeline
 *   npm run pipeline -- --institution=harvard --max-records=100
 *   npm run pipeline -- --resume
 *   npm run pipeline -- --only-emails --xlsx
 */

import * as dotenv from 'dotenv';
import { parseCliArgs, USAGE } from '../lib/cli';
import { loadConfig } from '../lib/config';
import { getErrorMessage } from '../lib/errors';
import { writeOutputs } from '../lib/export';
import { flushMonitoring, initMonitoring, logger, setLogFile, setLogLevel } from '../lib/monitoring';
import { FacultyPipeline } from '../lib/pipeline';

// Load environment variables
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message);
    console.error(USAGE);
    return 1;
  }

  const { args } = parsed;
  setLogLevel(args.verbose ? 'debug' : 'info');
  setLogFile(args.logFile);

  const config = loadConfig({ institutionKey: args.institution, apiKey: args.apiKey ?? undefined });
  initMonitoring({ dsn: config.sentryDsn, release: config.version });

  if (!config.searchApiKey) {
    logger.warn('No search API key configured; website discovery and fallback search will find nothing');
  }

  const pipeline = new FacultyPipeline(config, { checkpointDir: args.checkpointDir });
  const result = await pipeline.run({
    maxRecords: args.maxRecords,
    resume: args.resume,
    onlyWebsites: args.onlyWebsites,
    onlyEmails: args.onlyEmails,
    skip: args.skip,
    clearCheckpoints: args.clearCheckpoints,
  });

  const paths = await writeOutputs(result, { outputDir: args.outputDir, xlsx: args.xlsx });
  console.log('');
  console.log(`Faculty:  ${result.metadata.totalFaculty}`);
  console.log(`Websites: ${result.metadata.websitesFound}`);
  console.log(`Emails:   ${result.metadata.emailsFound}`);
  console.log(`JSON:     ${paths.json}`);
  console.log(`CSV:      ${paths.csv}`);
  if (paths.xlsx) console.log(`Excel:    ${paths.xlsx}`);

  return result.metadata.abortedAt ? 1 : 0;
}

main()
  .then(async (code) => {
    await flushMonitoring();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    logger.error('Pipeline failed', error);
    console.error(`Fatal: ${getErrorMessage(error)}`);
    await flushMonitoring();
    process.exit(1);
  });
