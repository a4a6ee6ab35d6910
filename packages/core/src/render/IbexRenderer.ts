/**
 * Ibex renderer - serializes Stims into the literal syntax of an ibex
 * `items` array and splices them into the scaffold.
 *
 * Fragment shapes (no escaping unless `escapeStrings` is set):
 *   spec      ["<label>", <item>]   or   "<label>" for fillers
 *   question  \n"Question", {q: "<text>", as: ["Yes", "No"]}\n
 *   stim      \n[<spec>, "<type>", {s: "<sentence>"}, <questions>]\n
 */

import type { Question, Spec, Stim } from '@linger2ibex/types';
import { isFiller } from '../parsing/SpecParser.js';
import { collectConditions, conditionLabel } from './conditions.js';
import { fillTemplate, loadTemplate } from './scaffold.js';

export const DEFAULT_STIMULUS_TYPE = 'DashedSentence';

const LIST_JOINER = ', ';
const STIM_JOINER = ',';

export interface RenderOptions {
  /** Ibex controller used for every generated item (default: DashedSentence) */
  stimulusType?: string;
  /** Escape quotes, backslashes and line terminators in authored text */
  escapeStrings?: boolean;
  /** Scaffold text; the bundled template is loaded when omitted */
  template?: string;
}

/**
 * Escape text for a double-quoted JS string literal.
 */
export function escapeJsString(text: string): string {
  return text.replace(/[\\"\n\r\u2028\u2029]/g, (ch) => {
    switch (ch) {
      case '\n':
        return '\\n';
      case '\r':
        return '\\r';
      case '\u2028':
        return '\\u2028';
      case '\u2029':
        return '\\u2029';
      default:
        return `\\${ch}`;
    }
  });
}

/**
 * Fragment writers for one rendering run.
 */
export class IbexRenderer {
  readonly stimulusType: string;
  private readonly escapeStrings: boolean;

  constructor(options: Pick<RenderOptions, 'stimulusType' | 'escapeStrings'> = {}) {
    this.stimulusType = options.stimulusType ?? DEFAULT_STIMULUS_TYPE;
    this.escapeStrings = options.escapeStrings ?? false;
  }

  enquote(text: string): string {
    return `"${this.escapeStrings ? escapeJsString(text) : text}"`;
  }

  renderSpec(spec: Spec): string {
    // fillers have no meaningful item number
    if (isFiller(spec)) {
      return this.enquote(conditionLabel(spec));
    }
    return `[${this.enquote(conditionLabel(spec))}, ${spec.item}]`;
  }

  renderQuestion(question: Question): string {
    const answers = question.answers.map(answer => this.enquote(answer)).join(LIST_JOINER);
    return `\n"Question", {q: ${this.enquote(question.question)}, as: [${answers}]}\n`;
  }

  /** Consumes `stim.questions` */
  renderStim(stim: Stim): string {
    const questions: string[] = [];
    for (const question of stim.questions) {
      questions.push(this.renderQuestion(question));
    }
    return `\n[${this.renderSpec(stim.spec)}, "${this.stimulusType}", {s: ${this.enquote(stim.sentence)}}, ${questions.join(LIST_JOINER)}]\n`;
  }

  renderConditions(conditions: Iterable<string>): string {
    return Array.from(conditions, condition => this.enquote(condition)).join(LIST_JOINER);
  }
}

/**
 * A rendered document with what went into it.
 */
export interface RenderedIbex {
  output: string;
  stimCount: number;
  conditions: Set<string>;
}

/**
 * Render the full ibex document for a sequence of stims.
 *
 * Stims are rendered in order, each question sequence drained exactly
 * once, before the condition set is collected.
 */
export function renderIbexDocument(stims: Iterable<Stim>, options: RenderOptions = {}): RenderedIbex {
  const renderer = new IbexRenderer(options);
  const all = Array.from(stims);
  const rendered = all.map(stim => renderer.renderStim(stim)).join(STIM_JOINER);
  const conditions = collectConditions(all);

  const output = fillTemplate(options.template ?? loadTemplate(), {
    conditions: renderer.renderConditions(conditions),
    stims: rendered,
  });
  return { output, stimCount: all.length, conditions };
}

export function renderIbex(stims: Iterable<Stim>, options: RenderOptions = {}): string {
  return renderIbexDocument(stims, options).output;
}
