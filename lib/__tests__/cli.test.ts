import { describe, it, expect } from 'vitest';
import { defaultCliArgs, parseCliArgs } from '../cli';

describe('parseCliArgs', () => {
  it('should use the defaults with no arguments', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'run', args: defaultCliArgs() });
  });

  it('should accept both value forms and short aliases', () => {
    const result = parseCliArgs(['--institution=stanford', '-m', '25', '-o', 'out', '--checkpoint-dir', 'ckpt']);
    expect(result).toEqual({
      kind: 'run',
      args: { ...defaultCliArgs(), institution: 'stanford', maxRecords: 25, outputDir: 'out', checkpointDir: 'ckpt' },
    });
  });

  it('should map skip flags to phases once each', () => {
    const result = parseCliArgs(['--skip-orcid', '--skip-fallback', '--skip-orcid']);
    expect(result.kind === 'run' && result.args.skip).toEqual(['orcid_emails', 'fallback_emails']);
  });

  it('should read the run-mode switches', () => {
    const result = parseCliArgs(['-r', '--only-emails', '--clear-checkpoints', '-v', '--xlsx', '--api-key=test-secret']);
    expect(result).toEqual({
      kind: 'run',
      args: {
        ...defaultCliArgs(),
        resume: true,
        onlyEmails: true,
        clearCheckpoints: true,
        verbose: true,
        xlsx: true,
        apiKey: 'test-secret',
      },
    });
  });

  it('should return help for -h', () => {
    expect(parseCliArgs(['--resume', '-h'])).toEqual({ kind: 'help' });
  });

  it('should reject unknown flags', () => {
    expect(parseCliArgs(['--fast'])).toEqual({ kind: 'error', message: 'Unknown option: --fast' });
    expect(parseCliArgs(['--resume=yes'])).toEqual({ kind: 'error', message: 'Unknown option: --resume=yes' });
  });

  it('should not take the next flag as a value', () => {
    expect(parseCliArgs(['--institution', '--resume'])).toEqual({
      kind: 'error',
      message: 'Missing value for --institution',
    });
    expect(parseCliArgs(['-i', '-r'])).toEqual({ kind: 'error', message: 'Missing value for -i' });
  });

  it('should reject a missing or invalid record cap', () => {
    expect(parseCliArgs(['--max-records'])).toEqual({ kind: 'error', message: 'Missing value for --max-records' });
    expect(parseCliArgs(['--max-records', '-5'])).toEqual({ kind: 'error', message: 'Missing value for --max-records' });
    expect(parseCliArgs(['-m', 'ten'])).toEqual({
      kind: 'error',
      message: '--max-records must be a positive integer, got "ten"',
    });
  });
});
