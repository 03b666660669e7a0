export type {
  SpanLabel,
  SpanExtractor,
  IdentifierKind,
  CandidateSpan,
  ExclusionReason,
  VerdictReason,
  RoleKind,
  Verdict,
  ClassifiedEntity,
  DocumentIntent,
  DocumentResult,
  ContextWindow,
  WindowRadii,
  ConfidenceLevels,
} from "./types.js";

export type { EntityRecognizer, Logger } from "./ports.js";
export { NullRecognizer, ConsoleLogger, MemoryLogger } from "./ports.js";

export {
  LaiPiiError,
  InvalidSpanError,
  LexiconNotLoadedError,
  TrainingDataError,
  BatchInputError,
  InvalidOptionsError,
} from "./errors.js";

export type { LexiconConfig, LexiconOverrides, LexiconSetName, Lexicon } from "./lexicon.js";
export {
  LexiconSet,
  createLexicon,
  defaultLexiconConfig,
  getDefaultLexicon,
  mergeLexiconConfig,
  parseLexiconOverrides,
  loadLexiconFile,
  lexiconConfigSchema,
  normalizePhrase,
} from "./lexicon.js";

export { extractWindow, contextWindow } from "./context-window.js";
export { extractStructured, extractAllStructured } from "./structured-extractor.js";
export { extractSpelledDigits } from "./spelled-digits.js";
export type { ExclusionResult } from "./exclusion.js";
export { checkExclusion } from "./exclusion.js";
export type { RoleResult } from "./role.js";
export { checkRole } from "./role.js";
export { hasAssociatedData } from "./associated-data.js";
export { decide, assertValidSpan, DEFAULT_RADII } from "./decision.js";
export type { NameRecognizerOptions } from "./name-recognizer.js";
export { NameRecognizer } from "./name-recognizer.js";

export type { ClassifierOptions, ClassifyOptions, PiiClassifier } from "./classifier.js";
export {
  createClassifier,
  getDefaultClassifier,
  classify,
  classifyText,
  DEFAULT_CONFIDENCE,
} from "./classifier.js";

export type {
  TrainingEntity,
  TrainingExample,
  TrainingDocument,
} from "./training-data.js";
export {
  parseTrainingData,
  loadTrainingData,
  trainingDocumentSchema,
} from "./training-data.js";

export type {
  EvaluationReport,
  EvaluationError,
  IntentMetrics,
  ConfusionMatrix,
} from "./evaluate.js";
export { evaluate, formatReport } from "./evaluate.js";

export type { BatchOptions, BatchResult, BatchSummary } from "./batch.js";
export { classifyCsv, RESULT_COLUMNS, ERROR_ROW_VALUES } from "./batch.js";
