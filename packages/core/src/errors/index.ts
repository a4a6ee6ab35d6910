export {
  ConversionError,
  GrammarError,
  AnswerError,
  FileAccessError,
  ConfigError,
} from './ConversionError.js';
export type { ErrorContext, ConversionErrorJSON, GrammarErrorCode } from './ConversionError.js';
