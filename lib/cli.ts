/**
 * Command-line argument parsing for scripts/run-pipeline.ts.
 *
 * Both `--flag=value` and `--flag value` forms are accepted for options
 * that take a value; the short aliases take the next argument.
 */

import type { SkippablePhase } from './pipeline';

export interface CliArgs {
  institution: string;
  maxRecords: number | null;
  outputDir: string;
  checkpointDir: string;
  resume: boolean;
  onlyWebsites: boolean;
  onlyEmails: boolean;
  skip: SkippablePhase[];
  clearCheckpoints: boolean;
  verbose: boolean;
  logFile: string | null;
  apiKey: string | null;
  xlsx: boolean;
}

export type CliParseResult =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const USAGE = `Usage: tsx scripts/run-pipeline.ts [options]

Options:
  -i, --institution <key>     Institution to process (default: harvard)
  -m, --max-records <n>       Cap the number of researchers extracted
  -o, --output <dir>          Output directory (default: output)
      --checkpoint-dir <dir>  Checkpoint directory (default: checkpoints)
  -r, --resume                Resume from the latest completed phase
      --only-websites         Only run website discovery on the latest checkpoint
      --only-emails           Only run the email phases on the latest checkpoint
      --skip-directories      Skip directory scraping
      --skip-websites         Skip website discovery
      --skip-orcid            Skip ORCID email lookup
      --skip-emails           Skip website email extraction
      --skip-fallback         Skip fallback email search
      --clear-checkpoints     Delete this institution's checkpoints first
      --api-key <key>         Search API key (overrides BRAVE_API_KEY)
      --log-file <path>       Also write log lines to this file
      --xlsx                  Also write an Excel workbook
  -v, --verbose               Debug logging
  -h, --help                  Show this message`;

const SKIP_FLAGS: Record<string, SkippablePhase> = {
  '--skip-directories': 'directories',
  '--skip-websites': 'websites',
  '--skip-orcid': 'orcid_emails',
  '--skip-emails': 'website_emails',
  '--skip-fallback': 'fallback_emails',
};

const VALUE_FLAGS: Record<string, string> = {
  '-i': '--institution',
  '--institution': '--institution',
  '-m': '--max-records',
  '--max-records': '--max-records',
  '-o': '--output',
  '--output': '--output',
  '--checkpoint-dir': '--checkpoint-dir',
  '--api-key': '--api-key',
  '--log-file': '--log-file',
};

export function defaultCliArgs(): CliArgs {
  return {
    institution: 'harvard',
    maxRecords: null,
    outputDir: 'output',
    checkpointDir: 'checkpoints',
    resume: false,
    onlyWebsites: false,
    onlyEmails: false,
    skip: [],
    clearCheckpoints: false,
    verbose: false,
    logFile: null,
    apiKey: null,
    xlsx: false,
  };
}

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const args = defaultCliArgs();

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const flag = eq === -1 ? raw : raw.slice(0, eq);

    const valueFlag = VALUE_FLAGS[flag];
    if (valueFlag) {
      const next: string | undefined = argv[i + 1];
      let value: string | undefined;
      if (eq !== -1) {
        value = raw.slice(eq + 1);
      } else if (next !== undefined && !next.startsWith('-')) {
        // a following flag is never taken as the value
        value = next;
        i++;
      }
      if (value === undefined || value === '') {
        return { kind: 'error', message: `Missing value for ${flag}` };
      }

      switch (valueFlag) {
        case '--institution':
          args.institution = value;
          break;
        case '--max-records': {
          const parsed = Number(value);
          if (!Number.isInteger(parsed) || parsed <= 0) {
            return { kind: 'error', message: `--max-records must be a positive integer, got "${value}"` };
          }
          args.maxRecords = parsed;
          break;
        }
        case '--output':
          args.outputDir = value;
          break;
        case '--checkpoint-dir':
          args.checkpointDir = value;
          break;
        case '--api-key':
          args.apiKey = value;
          break;
        case '--log-file':
          args.logFile = value;
          break;
      }
      continue;
    }

    if (eq !== -1) {
      return { kind: 'error', message: `Unknown option: ${raw}` };
    }

    const skipped = SKIP_FLAGS[flag];
    if (skipped) {
      if (!args.skip.includes(skipped)) args.skip.push(skipped);
      continue;
    }

    switch (flag) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-r':
      case '--resume':
        args.resume = true;
        break;
      case '--only-websites':
        args.onlyWebsites = true;
        break;
      case '--only-emails':
        args.onlyEmails = true;
        break;
      case '--clear-checkpoints':
        args.clearCheckpoints = true;
        break;
      case '-v':
      case '--verbose':
        args.verbose = true;
        break;
      case '--xlsx':
        args.xlsx = true;
        break;
      default:
        return { kind: 'error', message: `Unknown option: ${raw}` };
    }
  }

  return { kind: 'run', args };
}
