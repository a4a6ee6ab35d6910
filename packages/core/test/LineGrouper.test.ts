/**
 * Tests for the two-stage line grouper: blank-line blocks, then
 * spec-line stimulus groups.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { LineGroup } from '@linger2ibex/types';
import {
  numberLines,
  splitBlocks,
  splitStims,
  groupLines,
} from '../src/parsing/LineGrouper.js';
import { GrammarError } from '../src/errors/ConversionError.js';

function texts(group: LineGroup): string[] {
  return group.map(line => line.text);
}

describe('numberLines', () => {
  it('should trim lines and number them from 1', () => {
    const lines = Array.from(numberLines(['  # exp 1 a  ', '\tThe cat sat.\t', '   ']));

    assert.deepStrictEqual(lines, [
      { text: '# exp 1 a', lineNumber: 1 },
      { text: 'The cat sat.', lineNumber: 2 },
      { text: '', lineNumber: 3 },
    ]);
  });
});

describe('splitBlocks', () => {
  it('should split on blank lines and skip leading, trailing and repeated blanks', () => {
    const lines = numberLines(['', '# a 1 c', 'One.', '', '', '# b 2 d', 'Two.', '']);

    const blocks = Array.from(splitBlocks(lines), block => Array.from(block, line => line.text));

    assert.deepStrictEqual(blocks, [
      ['# a 1 c', 'One.'],
      ['# b 2 d', 'Two.'],
    ]);
  });

  it('should yield nothing for blank input', () => {
    assert.deepStrictEqual(Array.from(splitBlocks(numberLines(['', '', '']))), []);
  });

  it('should discard the unread rest of a block before the next one', () => {
    const lines = numberLines(['# a 1 c', 'One.', '? Yes? y', '', '# b 2 d', 'Two.']);
    const firsts: string[] = [];

    for (const block of splitBlocks(lines)) {
      const first = block.next();
      if (!first.done) firsts.push(first.value.text);
    }

    assert.deepStrictEqual(firsts, ['# a 1 c', '# b 2 d']);
  });

  it('should keep a block drainable after breaking out of a for..of', () => {
    const lines = numberLines(['# a 1 c', 'One.', '', '# b 2 d', 'Two.']);
    const firsts: string[] = [];

    for (const block of splitBlocks(lines)) {
      for (const line of block) {
        firsts.push(line.text);
        break;
      }
    }

    assert.deepStrictEqual(firsts, ['# a 1 c', '# b 2 d']);
  });
});

describe('splitStims', () => {
  it('should start a new group at each spec line', () => {
    const block = numberLines(['# a 1 c', 'One.', '? Sat? y', '# b 2 d', 'Two.']);

    const groups = Array.from(splitStims(block), texts);

    assert.deepStrictEqual(groups, [
      ['# a 1 c', 'One.', '? Sat? y'],
      ['# b 2 d', 'Two.'],
    ]);
  });

  it('should keep lines with other prefixes in the current group', () => {
    const block = numberLines(['# a 1 c', 'One.', '#note', '? Ok? n']);

    const groups = Array.from(splitStims(block), texts);

    assert.deepStrictEqual(groups, [['# a 1 c', 'One.', '#note', '? Ok? n']]);
  });

  it('should reject a block that does not start with a spec line', () => {
    const block = numberLines(['The cat sat.', '# a 1 c']);

    assert.throws(
      () => Array.from(splitStims(block)),
      (err: unknown) =>
        err instanceof GrammarError &&
        err.code === 'ERR_BLOCK_START' &&
        err.context.lineNumber === 1 &&
        err.context.line === 'The cat sat.'
    );
  });
});

describe('groupLines', () => {
  it('should flatten groups from all blocks in source order', () => {
    const lines = numberLines(['# a 1 c', 'One.', '# a 2 c', 'Two.', '', '# b 3 d', 'Three.']);

    const groups = Array.from(groupLines(lines), group => group.map(line => line.lineNumber));

    assert.deepStrictEqual(groups, [[1, 2], [3, 4], [6, 7]]);
  });

  it('should treat whitespace-only lines as block separators', () => {
    const lines = numberLines(['# a 1 c', 'One.', '   ', 'Not a spec.']);
    const groups = groupLines(lines);

    assert.deepStrictEqual(texts(groups.next().value ?? []), ['# a 1 c', 'One.']);
    assert.throws(() => groups.next(), GrammarError);
  });
});
