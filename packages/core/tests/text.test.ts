import { describe, expect, it } from 'vitest';
import { capitalize, describeError, errorType, truncate } from '../src/utils';
import { SourceError } from '../src/errors';

describe('text helpers', () => {
  it('leaves short text untouched and marks cuts with an ellipsis', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('exactly10!', 10)).toBe('exactly10!');
    expect(truncate('hello world again', 6)).toBe('hello…');
  });

  it('keeps the ellipsis within the length limit', () => {
    const cut = truncate('x'.repeat(300), 200);

    expect(cut).toBe(`${'x'.repeat(199)}…`);
    expect(Array.from(cut)).toHaveLength(200);
  });

  it('never splits a surrogate pair', () => {
    expect(truncate('a😀😀😀😀😀', 3)).toBe('a😀…');
    expect(truncate('😀😀', 2)).toBe('😀😀');
  });

  it('capitalizes category names', () => {
    expect(capitalize('technology')).toBe('Technology');
    expect(capitalize('')).toBe('');
  });

  it('names errors by their class name', () => {
    expect(errorType(new TypeError('x'))).toBe('TypeError');
    expect(errorType(new SourceError({ source: 'tavily', kind: 'network', message: 'down' }))).toBe('SourceError');
    expect(errorType('plain string')).toBe('string');
  });

  it('describes an error as type and truncated message', () => {
    const error = new Error('a'.repeat(150));

    expect(describeError(error, 120)).toBe(`Error: ${'a'.repeat(119)}…`);
    expect(describeError(new RangeError('bad range'), 120)).toBe('RangeError: bad range');
  });
});
