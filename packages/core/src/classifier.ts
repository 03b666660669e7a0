import type {
  CandidateSpan,
  ClassifiedEntity,
  ConfidenceLevels,
  DocumentResult,
  WindowRadii,
} from "./types.js";
import { z } from "zod";
import type { EntityRecognizer } from "./ports.js";
import type { Lexicon } from "./lexicon.js";
import { getDefaultLexicon } from "./lexicon.js";
import { DEFAULT_RADII, assertValidSpan, decide } from "./decision.js";
import { extractAllStructured } from "./structured-extractor.js";
import { NameRecognizer } from "./name-recognizer.js";
import { InvalidOptionsError } from "./errors.js";

export const DEFAULT_CONFIDENCE: Readonly<ConfidenceLevels> = Object.freeze({
  personal: 0.9,
  public: 0.85,
});

const confidenceSchema = z.object({
  personal: z.number().min(0).max(1),
  public: z.number().min(0).max(1),
});

function resolveConfidence(overrides: Partial<ConfidenceLevels> = {}): ConfidenceLevels {
  const parsed = confidenceSchema.safeParse({ ...DEFAULT_CONFIDENCE, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `confidence.${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InvalidOptionsError(`Invalid classifier options: ${issues}`);
  }
  return parsed.data;
}

/** Options fixed when a classifier is composed. */
export interface ClassifierOptions {
  /** Lexicon sets. Default: the sets shipped in data/lexicon. */
  lexicon?: Lexicon;
  /** PERSON span source for classifyText(). Default: NameRecognizer. */
  recognizer?: EntityRecognizer;
  /** Exclusion window radius, each side. Default: 30. */
  narrowRadius?: number;
  /** Role window radius, each side. Default: 100. */
  roleRadius?: number;
  /** Associated-data window radius, each side. Default: 150. */
  associatedRadius?: number;
  /** Confidence reported per intent, each within [0, 1]. Default: 0.9 / 0.85. */
  confidence?: Partial<ConfidenceLevels>;
  /** Report non-personal PERSON spans under `excluded`. Default: false. */
  verbose?: boolean;
}

/** Per-call options. */
export interface ClassifyOptions {
  verbose?: boolean;
}

export interface PiiClassifier {
  readonly lexicon: Lexicon;
  /** Decide every supplied span and aggregate them into a document result. */
  classify(
    text: string,
    spans: readonly CandidateSpan[],
    options?: ClassifyOptions
  ): DocumentResult;
  /**
   * Extract structured identifiers, recognize names, then classify. The
   * text is put in NFC form first; `result.text` holds that form.
   */
  classifyText(text: string, options?: ClassifyOptions): DocumentResult;
}

function compareEntities(a: ClassifiedEntity, b: ClassifiedEntity): number {
  const personRank = (e: ClassifiedEntity) => (e.span.label === "PERSON" ? 1 : 0);
  return (
    a.span.start - b.span.start ||
    a.span.end - b.span.end ||
    personRank(a) - personRank(b)
  );
}

function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

/**
 * Compose a classifier. The lexicon and recognizer are chosen here, once;
 * classification itself is synchronous and free of side effects. Throws
 * InvalidOptionsError for a confidence outside [0, 1].
 */
export function createClassifier(options: ClassifierOptions = {}): PiiClassifier {
  const lexicon = options.lexicon ?? getDefaultLexicon();
  const recognizer = options.recognizer ?? new NameRecognizer();
  const radii: WindowRadii = {
    narrow: options.narrowRadius ?? DEFAULT_RADII.narrow,
    role: options.roleRadius ?? DEFAULT_RADII.role,
    associated: options.associatedRadius ?? DEFAULT_RADII.associated,
  };
  const confidence = resolveConfidence(options.confidence);
  const defaultVerbose = options.verbose ?? false;

  function classify(
    text: string,
    spans: readonly CandidateSpan[],
    callOptions: ClassifyOptions = {}
  ): DocumentResult {
    const verbose = callOptions.verbose ?? defaultVerbose;

    // Reject bad input before deciding anything
    for (const span of spans) assertValidSpan(text, span);

    const entities: ClassifiedEntity[] = [];
    const excluded: ClassifiedEntity[] = [];

    for (const span of spans) {
      const verdict = decide(text, span, lexicon, radii);
      if (verdict.isPersonalData) entities.push({ span, verdict });
      else if (verbose) excluded.push({ span, verdict });
    }

    entities.sort(compareEntities);
    excluded.sort(compareEntities);

    const hasPersonalData = entities.length > 0;
    const result: DocumentResult = {
      text,
      intent: hasPersonalData ? "has_personal_data" : "public",
      confidence: hasPersonalData ? confidence.personal : confidence.public,
      entities,
    };
    if (verbose) result.excluded = excluded;
    return result;
  }

  function classifyText(text: string, callOptions: ClassifyOptions = {}): DocumentResult {
    // Offsets in the result refer to the NFC form
    const normalized = text.normalize("NFC");
    const persons = recognizer
      .recognize(normalized)
      .filter((s) => s.label === "PERSON" && countWords(s.text) >= 2);
    return classify(
      normalized,
      [...extractAllStructured(normalized), ...persons],
      callOptions
    );
  }

  return Object.freeze({ lexicon, classify, classifyText });
}

let defaultClassifier: PiiClassifier | null = null;

/** Classifier with the shipped lexicon and NameRecognizer, created on first use. */
export function getDefaultClassifier(): PiiClassifier {
  if (!defaultClassifier) {
    defaultClassifier = createClassifier();
  }
  return defaultClassifier;
}

/** classify() on the default classifier. */
export function classify(
  text: string,
  spans: readonly CandidateSpan[],
  options?: ClassifyOptions
): DocumentResult {
  return getDefaultClassifier().classify(text, spans, options);
}

/** classifyText() on the default classifier. */
export function classifyText(text: string, options?: ClassifyOptions): DocumentResult {
  return getDefaultClassifier().classifyText(text, options);
}
