/**
 * Tests for CLI command dispatch.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EXAMPLES_DIR } from '../../tests/support/examples.js';
import { testIo } from '../../tests/support/cli.js';
import { runCli } from './app.js';

describe('runCli', () => {
  it('should show help without a command', async () => {
    const { io, out } = testIo();
    expect(await runCli([], io, {})).toBe(0);
    expect(out.lines[0]).toContain('USAGE:\n  interview <command> [options]');
  });

  it('should show help for a command', async () => {
    const { io, out } = testIo();
    expect(await runCli(['help', 'check'], io, {})).toBe(0);
    expect(out.lines[0]).toContain('USAGE: interview check <paths...> [--strict]');
  });

  it('should show help for a command given --help', async () => {
    const { io, out } = testIo();
    expect(await runCli(['run', '--help'], io, {})).toBe(0);
    expect(out.lines[0]).toContain('USAGE: interview run <interview-id> [options]');
  });

  it('should list the configuration environment variables in run help', async () => {
    const { io, out } = testIo();
    expect(await runCli(['help', 'run'], io, {})).toBe(0);
    expect(out.lines[0]).toContain(
      'ENVIRONMENT:\n  INTERVIEW_ENGINE_DEFINITIONS_PATHS\n      Comma-separated definition files or directories\n'
    );
    expect(out.lines[0]).toContain(
      '  INTERVIEW_ENGINE_SESSION_SECRET\n      Secret new state tokens are signed with\n'
    );
  });

  it('should reject an unknown command', async () => {
    const { io, err } = testIo();
    expect(await runCli(['deploy'], io, {})).toBe(1);
    expect(err.lines[0]).toBe('Error: Unknown command: deploy');
  });

  it('should print the package version', async () => {
    const { io, out } = testIo();
    expect(await runCli(['version'], io, {})).toBe(0);
    expect(out.lines).toEqual(['interview-engine v0.1.0']);
  });
});

describe('check command', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cli-check-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  const flagged = [
    'interviews:',
    '  - id: demo',
    '    questions:',
    '      - id: q',
    '        when: feature_flag',
    '        fields:',
    '          answer:',
    '            type: text',
    '',
  ].join('\n');

  it('should summarize the interviews found', async () => {
    const { io, out, err } = testIo();
    expect(await runCli(['check', EXAMPLES_DIR], io, {})).toBe(0);
    expect(out.lines).toEqual([
      '  session-feedback "Session Feedback" (3 questions, 1 step)',
      '  new-registration "New Registration" (5 questions, 3 steps)',
      '  upgrade-registration "Upgrade Registration" (1 question, 2 steps)',
      'Checked 2 files: 3 interviews, 0 warnings',
    ]);
    expect(err.lines).toEqual([]);
  });

  it('should print lint warnings', async () => {
    const file = join(tempDir, 'demo.yaml');
    await writeFile(file, flagged);
    const { io, out } = testIo();

    expect(await runCli(['check', file], io, {})).toBe(0);
    expect(out.lines).toEqual([
      `warning: ${file}: interviews[demo].questions[q].when: Reference to undeclared path 'feature_flag'`,
      '  demo (1 question, 0 steps)',
      'Checked 1 file: 1 interview, 1 warning',
    ]);
  });

  it('should fail on lint findings under --strict', async () => {
    const file = join(tempDir, 'demo.yaml');
    await writeFile(file, flagged);
    const { io, out, err } = testIo();

    expect(await runCli(['check', file, '--strict'], io, {})).toBe(1);
    expect(out.lines).toEqual([]);
    expect(err.lines).toEqual([
      `Error: ${file}: interviews[demo].questions[q].when: Reference to undeclared path 'feature_flag'`,
    ]);
  });

  it('should fail on a missing path', async () => {
    const missing = join(tempDir, 'missing');
    const { io, err } = testIo();

    expect(await runCli(['check', missing], io, {})).toBe(1);
    expect(err.lines).toEqual([`Error: ${missing}: Definition path does not exist`]);
  });

  it('should require a path', async () => {
    const { io, err } = testIo();
    expect(await runCli(['check', '--strict'], io, {})).toBe(1);
    expect(err.lines).toEqual([
      'Error: Expected at least one definition file or directory',
      'Hint: Run "interview help check" for usage information.',
    ]);
  });
});

describe('run command', () => {
  const feedback = [
    'run',
    'session-feedback',
    '--definitions',
    EXAMPLES_DIR,
    '--context',
    '{"attendee": {"name": "Sam"}}',
  ];

  it('should walk an interview to completion', async () => {
    const { io, out, reader } = testIo(['true', '6', '4', '']);
    expect(await runCli(feedback, io, {})).toBe(0);

    expect(reader.prompts).toEqual([
      'attended (optional): ',
      'Rating (1 to 5): ',
      'Rating (1 to 5): ',
      'Anything else? (optional): ',
    ]);
    expect(out.lines.slice(0, 6)).toEqual([
      'Type :q at any prompt to stop.',
      '',
      'Hello, Sam',
      '----------',
      'Did you attend the session?',
      '  - I attended this session [true]',
    ]);
    expect(out.lines).toContain('  ! feedback.rating: Must be at most 5');
    expect(out.lines.at(-2)).toBe('Interview complete.');
    expect(JSON.parse(out.lines.at(-1) ?? '')).toEqual({
      attendee: { name: 'Sam' },
      attended: true,
      feedback: { rating: 4, comments: null },
    });
    expect(reader.closed()).toBe(true);
  });

  it('should show an exit', async () => {
    const { io, out } = testIo(['']);
    expect(await runCli(feedback, io, {})).toBe(0);
    expect(out.lines.slice(-3)).toEqual([
      '',
      'Thanks for letting us know',
      'Feedback is only collected from attendees.',
    ]);
  });

  it('should stop on :q', async () => {
    const { io, out, reader } = testIo([':q']);
    expect(
      await runCli(['run', 'new-registration', '--definitions', EXAMPLES_DIR], io, {})
    ).toBe(0);
    expect(out.lines.at(-1)).toBe('Interview stopped.');
    expect(reader.prompts).toEqual(['First Name: ']);
    expect(reader.closed()).toBe(true);
  });

  it('should report an unknown interview', async () => {
    const { io, err, reader } = testIo();
    expect(await runCli(['run', 'missing', '--definitions', EXAMPLES_DIR], io, {})).toBe(1);
    expect(err.lines).toEqual([
      "Error: Unknown interview 'missing'",
      'Hint: Run "interview check <paths...>" to list the interviews that load.',
    ]);
    expect(reader.closed()).toBe(true);
  });

  it('should require an interview id', async () => {
    const { io, err } = testIo();
    expect(await runCli(['run'], io, {})).toBe(1);
    expect(err.lines).toEqual([
      'Error: Expected an interview id',
      'Hint: Run "interview help run" for usage information.',
    ]);
  });
});
