import { describe, expect, it } from 'vitest';

import { InvalidInputError } from '../errors';
import { silentLogger } from '../testing/logger';
import { parseArgs } from './args';

const parse = (rawArgs: string[]) => parseArgs({ logger: silentLogger, rawArgs });

describe('parseArgs', () => {
  it('parses predict with a single name', () => {
    expect(parse(['predict', 'Alice'])).toEqual({ command: 'predict', name: 'Alice' });
  });

  it('joins unquoted multi-word names', () => {
    expect(parse(['predict', 'Mary', 'Ann'])).toEqual({ command: 'predict', name: 'Mary Ann' });
  });

  it('keeps numeric-looking names as text', () => {
    expect(parse(['predict', '007'])).toEqual({ command: 'predict', name: '007' });
  });

  it('parses popular with and without a limit', () => {
    expect(parse(['--', 'popular', 'ie', '--limit=3'])).toEqual({
      command: 'popular',
      countryCode: 'ie',
      limit: 3
    });
    expect(parse(['popular', 'ie'])).toEqual({ command: 'popular', countryCode: 'ie' });
  });

  it('parses prune', () => {
    expect(parse(['prune'])).toEqual({ command: 'prune' });
  });

  it('rejects missing or unknown commands', () => {
    expect(() => parse([])).toThrow(InvalidInputError);
    expect(() => parse(['frobnicate'])).toThrow('Unknown command "frobnicate".');
    expect(() => parse(['predict'])).toThrow('predict needs a name.');
    expect(() => parse(['popular'])).toThrow('popular needs exactly one country code.');
  });

  it('rejects a limit that is not a number', () => {
    expect(() => parse(['popular', 'ie', '--limit=many'])).toThrow(/^Invalid arguments: limit: /);
  });
});
