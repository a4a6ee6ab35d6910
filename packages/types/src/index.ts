/**
 * @linger2ibex/types - Record types shared by the linger2ibex packages
 */

export type {
  SourceLine,
  LineGroup,
  Spec,
  Answers,
  Question,
  Stim,
} from './stimuli.js';
