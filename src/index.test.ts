import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import {
  DefinitionCatalog,
  InterviewService,
  SessionCodec,
  VERSION,
  compileDefinitions,
} from './index.js';

describe('interview-engine', () => {
  describe('VERSION', () => {
    it('should match the package version', () => {
      const packageJson: unknown = JSON.parse(
        readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
      );
      expect(packageJson).toMatchObject({ version: VERSION });
    });
  });

  it('should run an interview through the public API', () => {
    const { interviews } = compileDefinitions({
      interviews: [
        {
          id: 'greeting',
          questions: [
            {
              id: 'name',
              title: 'Your name',
              fields: { name: { type: 'text', label: 'Name' } },
            },
          ],
          steps: [{ set: 'greeting', value: '"Hello, " + name' }],
        },
      ],
    });
    const catalog = new DefinitionCatalog();
    catalog.replace(interviews);
    const service = new InterviewService({
      catalog,
      codec: new SessionCodec({ secret: 'test-secret-for-index' }),
    });

    const first = service.start('greeting');
    expect(first).toMatchObject({ status: 'question', question: { id: 'name', title: 'Your name' } });

    const done = service.update(first.state, { question: 'name', values: { name: 'Ada' } });
    expect(done).toMatchObject({ status: 'complete', result: { name: 'Ada', greeting: 'Hello, Ada' } });
  });
});
