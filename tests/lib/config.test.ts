/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fetchConcurrency, loadConfig, parseConfig } from '../../src/lib/config';
import { ConfigValidationError } from '../../src/lib/errors';
import { baseConfigInput, makeConfig } from '../helpers/fixtures';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected ConfigValidationError');
}

describe('parseConfig', () => {
  it('fills defaults', () => {
    const config = makeConfig();

    expect(config.run.itemsPerTopic).toBe(8);
    expect(config.run.readingListMax).toBe(15);
    expect(config.run.outputPath).toBe('Research/Dailies');
    expect(config.run.libraryPath).toBe('Research/Library');
    expect(config.dedup.titleSimilarity).toBe(0.8);
    expect(config.tags).toEqual({
      keep: '#keep',
      kept: '#kept',
      good: '#good',
      bad: '#bad',
      notedSuffix: '-noted',
    });
    expect(config.qualityFilters.spamDetection.enabled).toBe(true);
    expect(config.mustFollow).toEqual([]);
  });

  it('returns a deeply frozen value', () => {
    const config = makeConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.run)).toBe(true);
    expect(Object.isFrozen(config.topics[0].searchQueries)).toBe(true);
  });

  it('lets SCANLINE_VAULT_PATH override the corpus path', () => {
    const config = parseConfig(baseConfigInput(), { SCANLINE_VAULT_PATH: '/srv/notes' });
    expect(config.run.corpusPath).toBe('/srv/notes');
  });

  it('strips @ from handles and defaults account groups', () => {
    const config = makeConfig(input => {
      input.mustFollow = [{ handle: '@SomeLab' }];
    });
    expect(config.mustFollow).toEqual([{ handle: 'SomeLab', group: 'Other', solo: false }]);
  });

  it('rejects a malformed regex with its path', () => {
    const issues = issuesOf(() =>
      makeConfig(input => {
        input.qualityFilters = { spamDetection: { lowEffort: { patterns: ['('] } } };
      })
    );
    expect(issues).toEqual(['qualityFilters.spamDetection.lowEffort.patterns.0: Invalid regular expression']);
  });

  it('rejects duplicate topic slugs', () => {
    const issues = issuesOf(() =>
      makeConfig(input => {
        input.topics = [
          { slug: 'agents', displayName: 'A', weight: 1, searchQueries: ['a'] },
          { slug: 'agents', displayName: 'B', weight: 1, searchQueries: ['b'] },
        ];
      })
    );
    expect(issues).toEqual(['topics.1.slug: Duplicate topic slug "agents"']);
  });

  it('rejects a non-numeric topic weight', () => {
    const input: unknown = {
      ...baseConfigInput(),
      topics: [{ slug: 'agents', displayName: 'A', weight: 'high', searchQueries: ['a'] }],
    };
    const issues = issuesOf(() => parseConfig(input, {}));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('topics.0.weight:')).toBe(true);
  });

  it('requires a corpus path', () => {
    const input: unknown = { topics: baseConfigInput().topics, run: {} };
    const issues = issuesOf(() => parseConfig(input, {}));
    expect(issues).toEqual(['run.corpusPath: Required']);
  });
});

describe('fetchConcurrency', () => {
  it('defaults to one worker per topic plus must-follow', () => {
    expect(fetchConcurrency(makeConfig(), 5)).toBe(6);
  });

  it('honours an explicit limit', () => {
    const config = makeConfig(input => {
      input.run.concurrency = 2;
    });
    expect(fetchConcurrency(config, 5)).toBe(2);
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads and validates a JSON file', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scanline-config-'));
    const file = path.join(dir, 'pipeline.json');
    await writeFile(file, JSON.stringify(baseConfigInput()), 'utf8');

    const config = await loadConfig(file);
    expect(config.topics.map(t => t.slug)).toEqual(['agents', 'rag']);
  });

  it('reports invalid JSON as a validation error', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scanline-config-'));
    const file = path.join(dir, 'pipeline.json');
    await writeFile(file, '{ not json', 'utf8');

    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('reports a missing file as a validation error', async () => {
    await expect(loadConfig('/nonexistent/scanline.json')).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
