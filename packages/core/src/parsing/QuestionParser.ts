/**
 * Question line grammar: `? <question text> <y|yes|n|no>`
 */

import type { Answers, Question, SourceLine } from '@linger2ibex/types';
import { AnswerError, GrammarError } from '../errors/ConversionError.js';

export const QUESTION_PREFIX = '? ';

const YES_FIRST: Answers = ['Yes', 'No'];
const NO_FIRST: Answers = ['No', 'Yes'];

/** Accepted answer tokens (lowercased) and the answer order they select */
const ANSWER_ORDERS = new Map<string, Answers>([
  ['y', YES_FIRST],
  ['yes', YES_FIRST],
  ['n', NO_FIRST],
  ['no', NO_FIRST],
]);

/** Question text, then the last whitespace-separated token */
const QUESTION_PATTERN = /^(.*?)\s+(\S+)$/;

/**
 * Answer order for an authored answer token, correct answer first.
 *
 * @throws AnswerError if the token is not y, yes, n or no (any case)
 */
export function answersFor(token: string, line?: SourceLine): Answers {
  const answers = ANSWER_ORDERS.get(token.toLowerCase());
  if (!answers) {
    throw new AnswerError(token, line ? { lineNumber: line.lineNumber, line: line.text } : {});
  }
  return answers;
}

/**
 * Parse a question line into a Question.
 */
export function parseQuestion(line: SourceLine): Question {
  const context = { lineNumber: line.lineNumber, line: line.text };

  if (!line.text.startsWith(QUESTION_PREFIX)) {
    throw new GrammarError(
      `Question line must start with "${QUESTION_PREFIX}"`,
      'ERR_QUESTION_PREFIX',
      context,
      'Only "? <question> <y|n>" lines may follow the sentence'
    );
  }

  const match = QUESTION_PATTERN.exec(line.text.slice(QUESTION_PREFIX.length).trim());
  if (!match) {
    throw new GrammarError(
      'Question line has no answer',
      'ERR_QUESTION_NO_ANSWER',
      context,
      'End the question with y, yes, n or no'
    );
  }

  const [, question, token] = match;
  return { question, answers: answersFor(token, line) };
}
