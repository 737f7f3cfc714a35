import { InvalidArgumentError } from 'commander';
import { optionalString, parseBoolish, parseFormat, parseIntish, parseRuleIds, stringList } from '../args';

describe('cli args', () => {
  it('parses boolish flags', () => {
    expect(parseBoolish(undefined, false)).toBe(false);
    expect(parseBoolish(true, false)).toBe(true);
    expect(parseBoolish('', false)).toBe(true);
    expect(parseBoolish('Yes', false)).toBe(true);
    expect(parseBoolish('off', true)).toBe(false);
    expect(parseBoolish('maybe', true)).toBe(true);
  });

  it('parses integers and report formats', () => {
    expect(parseIntish('12.7')).toBe(12);
    expect(parseIntish('abc')).toBeUndefined();
    expect(parseIntish('')).toBeUndefined();
    expect(parseFormat(undefined)).toBe('md');
    expect(parseFormat('JSON')).toBe('json');
    expect(parseFormat('markdown')).toBe('md');
    expect(() => parseFormat('xml')).toThrow(InvalidArgumentError);
  });

  it('accepts repeated and comma-separated rule ids, once each', () => {
    expect(parseRuleIds(undefined)).toBeUndefined();
    expect(parseRuleIds(['notified-setter,delegate-command-type', ' notified-setter '])).toEqual([
      'notified-setter',
      'delegate-command-type',
    ]);
    expect(parseRuleIds([','])).toBeUndefined();
  });

  it('rejects unknown rule ids', () => {
    expect(() => parseRuleIds(['notified-setter', 'nope'])).toThrow(
      "Unknown rule 'nope' (expected one of: notified-setter, simple-command-type, delegate-command-type)",
    );
  });

  it('normalizes optional strings and lists', () => {
    expect(optionalString('  ')).toBeUndefined();
    expect(optionalString(' a.json ')).toBe('a.json');
    expect(stringList(undefined)).toEqual([]);
    expect(stringList('x')).toEqual(['x']);
    expect(stringList(['x', 'y'])).toEqual(['x', 'y']);
  });
});
