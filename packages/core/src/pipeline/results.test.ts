import { describe, it, expect } from 'vitest';
import { ResultCollector, TaskResult, countResults, exitCodeFor } from './results';

const skipped = (path: string): TaskResult => ({
  path,
  outcome: 'skipped',
  attempts: 0,
  reason: 'no literals outside comments',
});

const written = (path: string): TaskResult => ({
  path,
  outcome: 'written',
  attempts: 1,
  receipt: { policy: 'overwrite', outputPath: path },
  warnings: [],
});

const failed = (path: string): TaskResult => ({
  path,
  outcome: 'failed',
  attempts: 1,
  kind: 'fatal',
  reason: 'Unauthorized',
});

describe('ResultCollector', () => {
  it('returns results in input order regardless of completion order', () => {
    const collector = new ResultCollector(['a', 'b', 'c']);
    collector.add(written('c'));
    collector.add(skipped('a'));
    collector.add(failed('b'));

    expect(collector.results().map((r) => r.path)).toEqual(['a', 'b', 'c']);
    expect(collector.counts()).toEqual({ skipped: 1, written: 1, failed: 1 });
  });

  it('rejects a second result for the same path', () => {
    const collector = new ResultCollector(['a']);
    collector.add(skipped('a'));

    expect(() => collector.add(written('a'))).toThrow('Duplicate result for a');
  });

  it('rejects results for paths that were never submitted', () => {
    const collector = new ResultCollector(['a']);
    expect(() => collector.add(skipped('z'))).toThrow('Result for unknown path: z');
  });

  it('reports paths still missing a result', () => {
    const collector = new ResultCollector(['a', 'b', 'c']);
    collector.add(skipped('b'));

    expect(collector.missing()).toEqual(['a', 'c']);
    expect(collector.counts()).toEqual({ skipped: 1, written: 0, failed: 0 });
  });
});

describe('exitCodeFor', () => {
  it('is 0 when nothing failed', () => {
    expect(exitCodeFor([])).toBe(0);
    expect(exitCodeFor([skipped('a'), written('b')])).toBe(0);
  });

  it('is 1 when any file failed', () => {
    expect(exitCodeFor([skipped('a'), failed('b'), written('c')])).toBe(1);
  });
});

describe('countResults', () => {
  it('counts each outcome', () => {
    expect(countResults([failed('a'), failed('b'), written('c')])).toEqual({
      skipped: 0,
      written: 1,
      failed: 2,
    });
  });
});
