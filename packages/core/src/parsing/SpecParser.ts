/**
 * Spec line grammar: `# <experiment> <item> <condition> [rest...]`
 */

import type { SourceLine, Spec } from '@linger2ibex/types';
import { GrammarError } from '../errors/ConversionError.js';
import { SPEC_PREFIX } from './LineGrouper.js';

const ITEM_PATTERN = /^\d+$/;

/** Experiments whose name starts with this are fillers */
export const FILLER_PREFIX = 'filler';

export function isFiller(spec: Spec): boolean {
  return spec.experiment.startsWith(FILLER_PREFIX);
}

/**
 * Parse a spec line into a Spec.
 *
 * @throws GrammarError on a missing prefix, fewer than three tokens, or an
 *   item token that is not a safe non-negative integer
 */
export function parseSpec(line: SourceLine): Spec {
  const context = { lineNumber: line.lineNumber, line: line.text };

  if (!line.text.startsWith(SPEC_PREFIX)) {
    throw new GrammarError(
      `Spec line must start with "${SPEC_PREFIX}"`,
      'ERR_SPEC_PREFIX',
      context
    );
  }

  const tokens = line.text.slice(SPEC_PREFIX.length).split(/\s+/).filter(token => token.length > 0);
  if (tokens.length < 3) {
    throw new GrammarError(
      `Spec line needs experiment, item and condition, got ${tokens.length} token(s)`,
      'ERR_SPEC_TOO_FEW_TOKENS',
      context,
      'Write it as "# <experiment> <item> <condition>"'
    );
  }

  const [experiment, itemToken, condition, ...rest] = tokens;
  if (!ITEM_PATTERN.test(itemToken)) {
    throw new GrammarError(
      `Item number is not an integer: ${itemToken}`,
      'ERR_BAD_INTEGER',
      context
    );
  }

  const item = Number.parseInt(itemToken, 10);
  // past 2^53 the rendered literal would no longer be the authored number
  if (!Number.isSafeInteger(item)) {
    throw new GrammarError(
      `Item number is too large: ${itemToken}`,
      'ERR_BAD_INTEGER',
      context,
      `Use item numbers up to ${Number.MAX_SAFE_INTEGER}`
    );
  }

  return {
    experiment,
    condition,
    item,
    rest,
  };
}
