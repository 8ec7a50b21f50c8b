import { describe, it, expect } from 'vitest';
import { createResult, formatHelp, parseArgs, renderResult } from '../src/cli-utils.js';

describe('parseArgs', () => {
  it('should read flags, options and positionals', () => {
    expect(parseArgs(['--csv', '--window=20', 'extra', '--trace', '-h'])).toEqual({
      help: true,
      pretty: false,
      csv: true,
      trace: true,
      options: { window: '20' },
      remaining: ['extra'],
    });
  });

  it('should keep everything after the first equals sign', () => {
    expect(parseArgs(['--log-file=a=b.log']).options).toEqual({ 'log-file': 'a=b.log' });
  });

  it('should pass unknown bare flags through as positionals', () => {
    expect(parseArgs(['--verbose']).remaining).toEqual(['--verbose']);
  });
});

describe('renderResult', () => {
  it('should render single-line JSON by default', () => {
    const result = createResult('wedge-verify', true, { cases: 4 });
    const line = renderResult(result, false);

    expect(line).not.toContain('\n');
    expect(JSON.parse(line)).toEqual({
      success: true,
      command: 'wedge-verify',
      timestamp: result.timestamp,
      data: { cases: 4 },
    });
  });

  it('should list errors in pretty mode', () => {
    const result = createResult('rolling-run', false, null, { errors: ['run.window: too small'] });
    const lines = renderResult(result, true).split('\n');

    expect(lines[1]).toBe('Command: rolling-run');
    expect(lines[2]).toBe('Status: FAILED');
    expect(lines.slice(-2)).toEqual(['Errors:', '  - run.window: too small']);
  });
});

describe('formatHelp', () => {
  it('should include the command and extra options', () => {
    const help = formatHelp('rolling-run', 'Track extrema', '  --csv             Rows');

    expect(help).toContain('rolling-run - Track extrema');
    expect(help).toContain('  --csv             Rows\n');
    expect(help).toContain('2  Fatal error or invalid usage');
  });
});
