import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileTools } from '../../src/tools/file-tools.js';
import { formatToolOutcome } from '../../src/tools/tool-system.js';

/**
 * Property-based tests for the file tools
 */
describe('File Tools Property Tests', () => {
  let testDir: string;
  let tools: FileTools;
  let run = 0;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'termcoder-pbt-'));
    tools = new FileTools({ rootDir: testDir });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  /**
   * Replace mode rewrites every occurrence of old_text and nothing else
   */
  describe('edit_file replacement', () => {
    it('replaces all occurrences of text present in the file', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.string(),
          fc.string({ minLength: 1, maxLength: 8 }),
          fc.string(),
          fc.string(),
          async (prefix, oldText, suffix, newText) => {
            const content = `${prefix}${oldText}${suffix}`;
            await writeFile(join(testDir, 'subject.txt'), content);

            const outcome = await tools.editFile({ path: 'subject.txt', old_text: oldText, new_text: newText });

            expect(outcome).toEqual({ ok: true, output: 'Successfully edited subject.txt' });
            expect(await readFile(join(testDir, 'subject.txt'), 'utf-8')).toBe(content.split(oldText).join(newText));
          }
        ),
        { numRuns: 50 }
      );
    });

    it('leaves the file untouched when the text is absent', async () => {
      await fc.assert(
        fc.asyncProperty(fc.stringMatching(/^[a-m]*$/), fc.stringMatching(/^[n-z]+$/), async (content, oldText) => {
          await writeFile(join(testDir, 'subject.txt'), content);

          const outcome = await tools.editFile({ path: 'subject.txt', old_text: oldText, new_text: 'x' });

          expect(outcome.ok).toBe(false);
          expect(await readFile(join(testDir, 'subject.txt'), 'utf-8')).toBe(content);
        }),
        { numRuns: 50 }
      );
    });
  });

  /**
   * Listings are sorted by name and tag each entry by kind
   */
  describe('list_files ordering', () => {
    const entries = fc.uniqueArray(
      fc.record({ name: fc.stringMatching(/^[a-zA-Z0-9_-]{1,12}$/), isDir: fc.boolean() }),
      { minLength: 1, maxLength: 10, selector: entry => entry.name }
    );

    it('lists every entry once, sorted, with the right tag', async () => {
      await fc.assert(
        fc.asyncProperty(entries, async (generated) => {
          const dir = `run-${run++}`;
          await mkdir(join(testDir, dir));
          for (const entry of generated) {
            if (entry.isDir) {
              await mkdir(join(testDir, dir, entry.name));
            } else {
              await writeFile(join(testDir, dir, entry.name), '');
            }
          }

          const outcome = await tools.listFiles({ path: dir });

          const expected = [...generated]
            .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
            .map(entry => (entry.isDir ? `[dir]  ${entry.name}/` : `[file] ${entry.name}`));
          expect(formatToolOutcome(outcome)).toBe([`Contents of ${dir}:`, ...expected].join('\n'));
        }),
        { numRuns: 30 }
      );
    });
  });
});
