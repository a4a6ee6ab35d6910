/**
 * Tests for the spec line grammar
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseSpec, isFiller } from '../src/parsing/SpecParser.js';
import { GrammarError, type GrammarErrorCode } from '../src/errors/ConversionError.js';

function line(text: string, lineNumber = 1) {
  return { text, lineNumber };
}

function grammarError(code: GrammarErrorCode) {
  return (err: unknown) => err instanceof GrammarError && err.code === code;
}

describe('parseSpec', () => {
  it('should read experiment, item and condition', () => {
    assert.deepStrictEqual(parseSpec(line('# exp1 3 cond1')), {
      experiment: 'exp1',
      condition: 'cond1',
      item: 3,
      rest: [],
    });
  });

  it('should keep extra tokens in rest', () => {
    const spec = parseSpec(line('# exp1 12 cond1 region2 long'));

    assert.strictEqual(spec.item, 12);
    assert.deepStrictEqual(spec.rest, ['region2', 'long']);
  });

  it('should split on any run of whitespace', () => {
    const spec = parseSpec(line('#   exp1 \t 4   cond1'));

    assert.strictEqual(spec.experiment, 'exp1');
    assert.strictEqual(spec.item, 4);
    assert.strictEqual(spec.condition, 'cond1');
  });

  it('should reject a line without the "# " prefix', () => {
    assert.throws(() => parseSpec(line('exp1 3 cond1')), grammarError('ERR_SPEC_PREFIX'));
    assert.throws(() => parseSpec(line('#exp1 3 cond1')), grammarError('ERR_SPEC_PREFIX'));
  });

  it('should reject fewer than three tokens', () => {
    assert.throws(() => parseSpec(line('# exp1 3', 7)), (err: unknown) =>
      err instanceof GrammarError &&
      err.code === 'ERR_SPEC_TOO_FEW_TOKENS' &&
      err.context.lineNumber === 7
    );
  });

  it('should reject an item that is not a non-negative integer', () => {
    assert.throws(() => parseSpec(line('# exp1 three cond1')), grammarError('ERR_BAD_INTEGER'));
    assert.throws(() => parseSpec(line('# exp1 -2 cond1')), grammarError('ERR_BAD_INTEGER'));
    assert.throws(() => parseSpec(line('# exp1 2.5 cond1')), grammarError('ERR_BAD_INTEGER'));
  });

  it('should reject an item number beyond the exactly representable range', () => {
    assert.throws(() => parseSpec(line('# exp1 12345678901234567891 cond1')), grammarError('ERR_BAD_INTEGER'));
    assert.throws(() => parseSpec(line('# exp1 1000000000000000000000 cond1')), grammarError('ERR_BAD_INTEGER'));
    assert.throws(() => parseSpec(line('# exp1 9007199254740992 cond1')), grammarError('ERR_BAD_INTEGER'));
  });

  it('should accept the largest exactly representable item number', () => {
    assert.strictEqual(parseSpec(line('# exp1 9007199254740991 cond1')).item, 9007199254740991);
  });
});

describe('isFiller', () => {
  it('should match experiments starting with "filler"', () => {
    assert.strictEqual(isFiller(parseSpec(line('# filler1 7 condA'))), true);
    assert.strictEqual(isFiller(parseSpec(line('# fillers 0 x'))), true);
  });

  it('should not match other experiments', () => {
    assert.strictEqual(isFiller(parseSpec(line('# exp1 7 condA'))), false);
    assert.strictEqual(isFiller(parseSpec(line('# Filler 7 condA'))), false);
  });
});
