/**
 * ConversionError - Error hierarchy for linger2ibex
 *
 * Every failure aborts the whole conversion; errors are thrown to unwind,
 * never caught inside the pipeline.
 *
 * Error types:
 * - GrammarError: malformed spec line, block or stimulus group (fatal)
 * - AnswerError: question line with an unrecognized answer (fatal)
 * - FileAccessError: missing or unreadable input/template file (fatal)
 * - ConfigError: config file parsing/validation errors (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  /** Offending source line, after trimming */
  line?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ConversionError
 */
export interface ConversionErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Codes raised by the grammar parsers and the line grouper
 */
export type GrammarErrorCode =
  | 'ERR_BLOCK_START'
  | 'ERR_SPEC_PREFIX'
  | 'ERR_SPEC_TOO_FEW_TOKENS'
  | 'ERR_BAD_INTEGER'
  | 'ERR_EMPTY_STIM'
  | 'ERR_QUESTION_PREFIX'
  | 'ERR_QUESTION_NO_ANSWER';

/**
 * Abstract base class for all linger2ibex errors.
 */
export abstract class ConversionError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ConversionErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Malformed grammar - bad spec line, block not starting with a spec line,
 * stimulus without a sentence, question line without prefix or answer
 *
 * Severity: fatal (always)
 */
export class GrammarError extends ConversionError {
  readonly code: GrammarErrorCode;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: GrammarErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Unrecognized answer - trailing token of a question line is not y/yes/n/no
 *
 * Severity: fatal (always)
 * Codes: ERR_UNKNOWN_ANSWER
 */
export class AnswerError extends ConversionError {
  readonly code = 'ERR_UNKNOWN_ANSWER' as const;
  readonly severity = 'fatal' as const;
  readonly answer: string;

  constructor(answer: string, context: ErrorContext = {}) {
    super(
      `Unknown answer in question: ${answer}`,
      context,
      'End each question line with y, yes, n or no'
    );
    this.answer = answer;
  }
}

/**
 * File access error - missing or unreadable file
 *
 * Severity: fatal (always)
 * Codes: ERR_FILE_NOT_FOUND, ERR_FILE_UNREADABLE
 */
export class FileAccessError extends ConversionError {
  readonly code: 'ERR_FILE_NOT_FOUND' | 'ERR_FILE_UNREADABLE';
  readonly severity = 'fatal' as const;

  constructor(
    message: string,
    code: 'ERR_FILE_NOT_FOUND' | 'ERR_FILE_UNREADABLE',
    context: ErrorContext = {},
    suggestion?: string
  ) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config file parsing, wrongly typed keys
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends ConversionError {
  readonly code = 'ERR_CONFIG_INVALID' as const;
  readonly severity = 'fatal' as const;
}
