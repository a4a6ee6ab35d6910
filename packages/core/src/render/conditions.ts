import type { Spec, Stim } from '@linger2ibex/types';

/** `<experiment>_<condition>`, the label ibex shuffles by */
export function conditionLabel(spec: Spec): string {
  return [spec.experiment, spec.condition].join('_');
}

/**
 * Distinct condition labels across all stims, in order of first appearance.
 */
export function collectConditions(stims: Iterable<Stim>): Set<string> {
  const conditions = new Set<string>();
  for (const stim of stims) {
    conditions.add(conditionLabel(stim.spec));
  }
  return conditions;
}
