/**
 * @linger2ibex/core - linger to ibex conversion
 */

// Error types
export {
  ConversionError,
  GrammarError,
  AnswerError,
  FileAccessError,
  ConfigError,
} from './errors/index.js';
export type { ErrorContext, ConversionErrorJSON, GrammarErrorCode } from './errors/index.js';

// Logging
export { ConsoleLogger, createLogger, isLogLevel, LOG_LEVELS } from './logging/Logger.js';
export type { Logger, LogLevel, LogSink } from './logging/Logger.js';

// Config
export { loadConfig, validateConfig, resolveConfigPath, CONFIG_FILE_NAME } from './config/index.js';
export type { Linger2IbexConfig } from './config/index.js';

// Parsing
export {
  numberLines,
  splitBlocks,
  splitStims,
  groupLines,
  BlockCursor,
  SPEC_PREFIX,
  BLOCK_SEPARATOR,
} from './parsing/LineGrouper.js';
export { parseSpec, isFiller, FILLER_PREFIX } from './parsing/SpecParser.js';
export { parseQuestion, answersFor, QUESTION_PREFIX } from './parsing/QuestionParser.js';
export { parseStim, parseLinger } from './parsing/StimAssembler.js';

// Rendering
export { conditionLabel, collectConditions } from './render/conditions.js';
export { loadTemplate, fillTemplate, DEFAULT_TEMPLATE_PATH } from './render/scaffold.js';
export type { TemplateValues } from './render/scaffold.js';
export {
  IbexRenderer,
  renderIbex,
  renderIbexDocument,
  escapeJsString,
  DEFAULT_STIMULUS_TYPE,
} from './render/IbexRenderer.js';
export type { RenderOptions, RenderedIbex } from './render/IbexRenderer.js';

// Pipeline
export { convert, splitLines } from './convert.js';
export type { ConvertOptions } from './convert.js';
