/**
 * Line grouper - turns the raw line stream into stimulus groups.
 *
 * Two stages, both lazy:
 * 1. splitBlocks() cuts the stream at blank lines
 * 2. splitStims() cuts each block at spec lines (`# ...`)
 *
 * groupLines() chains them into one sequence of LineGroups in source order.
 */

import type { LineGroup, SourceLine } from '@linger2ibex/types';
import { GrammarError } from '../errors/ConversionError.js';

/** Prefix that opens a spec line and starts a new stimulus group */
export const SPEC_PREFIX = '# ';

/** Trimmed line value that separates blocks */
export const BLOCK_SEPARATOR = '';

/**
 * Trim each raw line and attach its 1-based line number.
 */
export function* numberLines(lines: Iterable<string>): Generator<SourceLine> {
  let lineNumber = 0;
  for (const raw of lines) {
    lineNumber++;
    yield { text: raw.trim(), lineNumber };
  }
}

/**
 * Lines of one block, read straight from the shared source iterator.
 *
 * Has no return(): breaking out of a for..of over a block leaves it open,
 * so the splitter can still drain it before looking for the next block.
 */
export class BlockCursor implements IterableIterator<SourceLine> {
  private first: SourceLine | undefined;
  private ended = false;

  constructor(first: SourceLine, private readonly source: Iterator<SourceLine>) {
    this.first = first;
  }

  next(): IteratorResult<SourceLine, undefined> {
    if (this.first) {
      const line = this.first;
      this.first = undefined;
      return { done: false, value: line };
    }
    if (this.ended) {
      return { done: true, value: undefined };
    }
    const result = this.source.next();
    if (result.done || result.value.text === BLOCK_SEPARATOR) {
      this.ended = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: result.value };
  }

  /** Consume whatever the reader of this block left behind */
  drain(): void {
    while (!this.next().done) {
      // discard
    }
  }

  [Symbol.iterator](): BlockCursor {
    return this;
  }
}

/**
 * Split lines into blocks separated by blank lines.
 *
 * Leading, trailing and repeated blank lines never produce an empty block.
 * Each block must be consumed before asking for the next one; whatever is
 * left unread is discarded.
 */
export function* splitBlocks(lines: Iterable<SourceLine>): Generator<BlockCursor> {
  const source = lines[Symbol.iterator]();

  for (;;) {
    let result = source.next();
    while (!result.done && result.value.text === BLOCK_SEPARATOR) {
      result = source.next();
    }
    if (result.done) return;

    const block = new BlockCursor(result.value, source);
    yield block;
    block.drain();
  }
}

/**
 * Split one block into stimulus groups, each starting at a spec line.
 *
 * Lines up to the next spec line, whatever their prefix, stay in the
 * current group.
 */
export function* splitStims(block: Iterable<SourceLine>): Generator<LineGroup> {
  let group: SourceLine[] | undefined;

  for (const line of block) {
    const isSpec = line.text.startsWith(SPEC_PREFIX);

    if (!group) {
      if (!isSpec) {
        throw new GrammarError(
          `Block must start with a spec line ("${SPEC_PREFIX}...")`,
          'ERR_BLOCK_START',
          { lineNumber: line.lineNumber, line: line.text },
          'Separate items with a blank line and open each with "# <experiment> <item> <condition>"'
        );
      }
      group = [line];
      continue;
    }

    if (isSpec) {
      yield group;
      group = [line];
    } else {
      group.push(line);
    }
  }

  if (group) {
    yield group;
  }
}

/**
 * Group a stream of numbered lines into stimulus groups across all blocks.
 */
export function* groupLines(lines: Iterable<SourceLine>): Generator<LineGroup> {
  for (const block of splitBlocks(lines)) {
    yield* splitStims(block);
  }
}
