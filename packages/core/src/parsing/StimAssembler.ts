/**
 * Stim assembly - one LineGroup to one Stim, and the whole linger pipeline
 * from raw lines to a lazy sequence of Stims.
 */

import type { LineGroup, Question, SourceLine, Stim } from '@linger2ibex/types';
import { GrammarError } from '../errors/ConversionError.js';
import { groupLines, numberLines } from './LineGrouper.js';
import { parseQuestion } from './QuestionParser.js';
import { parseSpec } from './SpecParser.js';

function* parseQuestions(lines: readonly SourceLine[]): Generator<Question> {
  for (const line of lines) {
    yield parseQuestion(line);
  }
}

/**
 * Build a Stim from its group: spec line, sentence, question lines.
 *
 * The spec is parsed now; questions are parsed when `questions` is iterated.
 */
export function parseStim(group: LineGroup): Stim {
  const [specLine, sentenceLine, ...questionLines] = group;

  if (!specLine || !sentenceLine) {
    throw new GrammarError(
      'Stimulus has no sentence after its spec line',
      'ERR_EMPTY_STIM',
      specLine ? { lineNumber: specLine.lineNumber, line: specLine.text } : {}
    );
  }

  return {
    spec: parseSpec(specLine),
    sentence: sentenceLine.text,
    questions: parseQuestions(questionLines),
  };
}

/**
 * Parse linger-format lines into Stims, lazily and in source order.
 */
export function* parseLinger(lines: Iterable<string>): Generator<Stim> {
  for (const group of groupLines(numberLines(lines))) {
    yield parseStim(group);
  }
}
