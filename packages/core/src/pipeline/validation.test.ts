import { describe, it, expect } from 'vitest';
import { checkRewrite } from './validation';

const source = 'class A { String s = "hi"; }';

describe('checkRewrite', () => {
  it('reports nothing for a plausible rewrite', () => {
    const rewritten = 'class A { static final String HI = "hi"; String s = HI; }';
    expect(
      checkRewrite(source, rewritten, { onUnchanged: 'fatal', onLiteralsDropped: 'fatal' }),
    ).toEqual([]);
  });

  it('flags unchanged output with the configured mode', () => {
    expect(
      checkRewrite(source, source, { onUnchanged: 'warn', onLiteralsDropped: 'accept' }),
    ).toEqual([
      {
        check: 'unchanged',
        mode: 'warn',
        message: 'Rewritten text is identical to the original',
      },
    ]);
  });

  it('flags output that lost every literal', () => {
    const rewritten = 'class A { String s = HI; } // "HI" lives elsewhere';
    expect(
      checkRewrite(source, rewritten, { onUnchanged: 'warn', onLiteralsDropped: 'fatal' }),
    ).toEqual([
      {
        check: 'literals-dropped',
        mode: 'fatal',
        message: 'Rewritten text has no string literals outside comments',
      },
    ]);
  });

  it('skips checks set to accept', () => {
    expect(
      checkRewrite(source, source, { onUnchanged: 'accept', onLiteralsDropped: 'accept' }),
    ).toEqual([]);
  });
});
