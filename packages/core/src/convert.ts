/**
 * convert() - linger text in, ibex fragment out.
 *
 * Everything is parsed and rendered before the string is returned, so a
 * failure anywhere leaves no partial output.
 */

import { parseLinger } from './parsing/StimAssembler.js';
import { DEFAULT_STIMULUS_TYPE, renderIbexDocument, type RenderOptions } from './render/IbexRenderer.js';
import type { Logger } from './logging/Logger.js';

export interface ConvertOptions extends RenderOptions {
  logger?: Logger;
}

/** Split file contents into lines, accepting LF and CRLF */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function convert(text: string, options: ConvertOptions = {}): string {
  const { logger, ...renderOptions } = options;
  const stims = Array.from(parseLinger(splitLines(text)));

  logger?.debug('Parsed stimuli', { count: stims.length });

  const { output, stimCount, conditions } = renderIbexDocument(stims, renderOptions);
  logger?.debug('Collected conditions', { conditions: [...conditions] });
  logger?.info(`Rendered ${stimCount} stimuli as ${renderOptions.stimulusType ?? DEFAULT_STIMULUS_TYPE} items`);
  return output;
}
