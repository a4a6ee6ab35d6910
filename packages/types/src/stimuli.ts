/**
 * Stimulus records - the structured form of a linger item.
 *
 * Produced by the grammar parsers in @linger2ibex/core, consumed by the
 * ibex renderer. Plain readonly data, created fresh per conversion.
 */

/**
 * One trimmed input line together with its 1-based position in the source.
 */
export interface SourceLine {
  readonly text: string;
  readonly lineNumber: number;
}

/**
 * Lines belonging to one stimulus: spec line, sentence, then question lines.
 */
export type LineGroup = readonly SourceLine[];

/**
 * Experimental cell of a trial, parsed from `# <experiment> <item> <condition> ...`.
 *
 * Experiments named `filler...` carry an item number that is never rendered.
 */
export interface Spec {
  readonly experiment: string;
  readonly condition: string;
  /** Non-negative item index */
  readonly item: number;
  /** Tokens after the condition; kept but not rendered */
  readonly rest: readonly string[];
}

/**
 * Answer pair with the correct answer first.
 */
export type Answers = readonly ['Yes', 'No'] | readonly ['No', 'Yes'];

export interface Question {
  readonly question: string;
  readonly answers: Answers;
}

/**
 * One experimental trial.
 *
 * `questions` is lazy and single-pass: iterating it parses the question
 * lines, and a second iteration yields nothing.
 */
export interface Stim {
  readonly spec: Spec;
  readonly sentence: string;
  readonly questions: Iterable<Question>;
}
