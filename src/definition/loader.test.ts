import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DefinitionError } from './errors.js';
import { loadDefinitionFiles } from './loader.js';

const EXAMPLES = fileURLToPath(new URL('../../examples', import.meta.url));

const MINIMAL_YAML = (id: string): string =>
  [
    'interviews:',
    `  - id: ${id}`,
    '    questions:',
    '      - id: q',
    '        fields:',
    '          answer:',
    '            type: text',
    '',
  ].join('\n');

async function rejection(promise: Promise<unknown>): Promise<DefinitionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DefinitionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a DefinitionError');
}

describe('loadDefinitionFiles', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'definitions-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should load the bundled examples in file name order', async () => {
    const loaded = await loadDefinitionFiles([EXAMPLES]);

    expect(loaded.files).toEqual([
      join(EXAMPLES, 'feedback.toml'),
      join(EXAMPLES, 'registration.yaml'),
    ]);
    expect(loaded.interviews.map((interview) => interview.id)).toEqual([
      'session-feedback',
      'new-registration',
      'upgrade-registration',
    ]);
    expect(loaded.warnings).toEqual([]);
  });

  it('should search directories recursively and skip other files', async () => {
    await mkdir(join(tempDir, 'nested'));
    await writeFile(join(tempDir, 'b.yml'), MINIMAL_YAML('second'));
    await writeFile(join(tempDir, 'nested', 'a.yaml'), MINIMAL_YAML('nested'));
    await writeFile(join(tempDir, 'notes.md'), '# not a definition\n');

    const loaded = await loadDefinitionFiles([tempDir]);
    expect(loaded.interviews.map((interview) => interview.id)).toEqual(['second', 'nested']);
  });

  it('should read a file named twice once', async () => {
    const file = join(tempDir, 'a.yaml');
    await writeFile(file, MINIMAL_YAML('demo'));

    const loaded = await loadDefinitionFiles([file, tempDir]);
    expect(loaded.files).toEqual([file]);
  });

  it('should reject a missing path', async () => {
    const missing = join(tempDir, 'missing');
    const error = await rejection(loadDefinitionFiles([missing]));
    expect(error.message).toBe(`${missing}: Definition path does not exist`);
  });

  it('should reject a file with another extension', async () => {
    const file = join(tempDir, 'interviews.json');
    await writeFile(file, '{}');
    const error = await rejection(loadDefinitionFiles([file]));
    expect(error.location).toBe(file);
  });

  it('should reject interview ids repeated across files', async () => {
    const first = join(tempDir, 'a.yaml');
    const second = join(tempDir, 'b.yaml');
    await writeFile(first, MINIMAL_YAML('demo'));
    await writeFile(second, MINIMAL_YAML('demo'));

    const error = await rejection(loadDefinitionFiles([tempDir]));
    expect(error.message).toBe(
      `${second}: interviews[demo]: Duplicate interview id 'demo' (first defined in ${first})`
    );
  });

  it('should prefix compile errors with the file', async () => {
    const file = join(tempDir, 'a.toml');
    await writeFile(
      file,
      [
        '[[interviews]]',
        'id = "demo"',
        '',
        '[[interviews.questions]]',
        'id = "q"',
        '',
        '[interviews.questions.fields.answer]',
        'type = "number"',
        'min = "one"',
        '',
      ].join('\n')
    );

    const error = await rejection(loadDefinitionFiles([file]));
    expect(error.location).toBe(`${file}: interviews[demo].questions[q].fields[answer].min`);
  });

  it('should read unquoted date bounds the same way from YAML and TOML', async () => {
    await writeFile(
      join(tempDir, 'a.yaml'),
      [
        'interviews:',
        '  - id: from-yaml',
        '    questions:',
        '      - id: q',
        '        fields:',
        '          born:',
        '            type: date',
        '            min: 2000-01-01',
        '',
      ].join('\n')
    );
    await writeFile(
      join(tempDir, 'b.toml'),
      [
        '[[interviews]]',
        'id = "from-toml"',
        '',
        '[[interviews.questions]]',
        'id = "q"',
        '',
        '[interviews.questions.fields.born]',
        'type = "date"',
        'min = 2000-01-01',
        '',
      ].join('\n')
    );

    const loaded = await loadDefinitionFiles([tempDir]);
    const bounds = loaded.interviews.map((interview) =>
      interview.questions[0]?.fields[0]?.describe({}).constraints
    );
    expect(bounds).toEqual([{ min: '2000-01-01' }, { min: '2000-01-01' }]);
  });

  it('should report lint warnings with their file', async () => {
    const file = join(tempDir, 'a.yaml');
    await writeFile(
      file,
      [
        'interviews:',
        '  - id: demo',
        '    questions:',
        '      - id: q',
        '        when: feature_flag',
        '        fields:',
        '          answer:',
        '            type: text',
        '',
      ].join('\n')
    );

    const loaded = await loadDefinitionFiles([file]);
    expect(loaded.warnings.map((warning) => warning.location)).toEqual([
      `${file}: interviews[demo].questions[q].when`,
    ]);
  });
});
