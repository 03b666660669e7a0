import { readFileSync } from "node:fs";
import { z } from "zod";
import exclusionTermsData from "../data/lexicon/exclusion-terms.json" with { type: "json" };
import individualizingData from "../data/lexicon/individualizing.json" with { type: "json" };
import { LexiconNotLoadedError } from "./errors.js";

/** Phrase lists accepted as lexicon configuration. */
export interface LexiconConfig {
  exclusionTerms: string[];
  individualizingVerbs: string[];
  individualizingRoles: string[];
  identificationContexts: string[];
}

export type LexiconSetName = keyof LexiconConfig;

const phraseList = z.array(z.string());

/** Schema for a lexicon override file. Every set is optional; absent sets keep the defaults. */
export const lexiconConfigSchema = z
  .object({
    exclusionTerms: phraseList,
    individualizingVerbs: phraseList,
    individualizingRoles: phraseList,
    identificationContexts: phraseList,
  })
  .partial()
  .strict();

export type LexiconOverrides = z.infer<typeof lexiconConfigSchema>;

const WORD_CHAR = /[\p{L}\p{N}]/u;

/** Lowercase, trim and collapse inner whitespace. */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase().replace(/\s+/g, " ");
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile a phrase into a matcher that refuses to match inside a word.
 * The boundary is only enforced on ends that are letters or digits, so
 * "nome:" still matches "nome:maria".
 */
function compilePhrase(phrase: string): RegExp {
  const head = WORD_CHAR.test(phrase[0]) ? "(?<![\\p{L}\\p{N}])" : "";
  const tail = WORD_CHAR.test(phrase[phrase.length - 1])
    ? "(?![\\p{L}\\p{N}])"
    : "";
  return new RegExp(`${head}${escapeRegExp(phrase)}${tail}`, "u");
}

/**
 * An immutable, normalized set of phrases. Iteration and matching follow
 * declaration order, with the dot-free variant of a dotted phrase placed
 * right after it.
 */
export class LexiconSet {
  readonly name: string;
  readonly phrases: readonly string[];
  private matchers: readonly { phrase: string; re: RegExp }[];
  private index: ReadonlySet<string>;

  constructor(name: string, phrases: Iterable<string>) {
    const ordered: string[] = [];
    const seen = new Set<string>();
    const add = (p: string) => {
      if (p && !seen.has(p)) {
        seen.add(p);
        ordered.push(p);
      }
    };

    for (const raw of phrases) {
      const phrase = normalizePhrase(raw);
      add(phrase);
      if (phrase.includes(".")) add(phrase.replace(/\./g, "").trim());
    }

    this.name = name;
    this.phrases = Object.freeze(ordered);
    this.index = seen;
    this.matchers = Object.freeze(
      ordered.map((phrase) => Object.freeze({ phrase, re: compilePhrase(phrase) }))
    );
    Object.freeze(this);
  }

  get size(): number {
    return this.phrases.length;
  }

  has(phrase: string): boolean {
    return this.index.has(normalizePhrase(phrase));
  }

  /** First phrase, in declaration order, occurring as a whole phrase in the window. */
  findIn(window: string): string | undefined {
    for (const { phrase, re } of this.matchers) {
      if (re.test(window)) return phrase;
    }
    return undefined;
  }
}

/** The four lexicon sets shared by every classification. */
export interface Lexicon {
  readonly exclusionTerms: LexiconSet;
  readonly individualizingVerbs: LexiconSet;
  readonly individualizingRoles: LexiconSet;
  readonly identificationContexts: LexiconSet;
}

/** Build a frozen lexicon. Every set must be present and non-empty. */
export function createLexicon(config: Partial<LexiconConfig>): Lexicon {
  const build = (name: LexiconSetName): LexiconSet => {
    const phrases = config[name];
    if (!phrases) throw new LexiconNotLoadedError(name);
    const set = new LexiconSet(name, phrases);
    if (set.size === 0) throw new LexiconNotLoadedError(name);
    return set;
  };

  return Object.freeze({
    exclusionTerms: build("exclusionTerms"),
    individualizingVerbs: build("individualizingVerbs"),
    individualizingRoles: build("individualizingRoles"),
    identificationContexts: build("identificationContexts"),
  });
}

/** Phrase lists shipped with the package. Returns fresh arrays on each call. */
export function defaultLexiconConfig(): LexiconConfig {
  return {
    exclusionTerms: Object.values(exclusionTermsData).flat(),
    individualizingVerbs: [...individualizingData.verbs],
    individualizingRoles: [...individualizingData.roles],
    identificationContexts: [...individualizingData.identification_contexts],
  };
}

let defaultLexicon: Lexicon | null = null;

/** The process-wide lexicon built from the shipped data, created on first use. */
export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = createLexicon(defaultLexiconConfig());
  }
  return defaultLexicon;
}

/** Replace the default sets named in `overrides`, keeping the others. */
export function mergeLexiconConfig(
  base: LexiconConfig,
  overrides: LexiconOverrides
): LexiconConfig {
  return {
    exclusionTerms: overrides.exclusionTerms ?? base.exclusionTerms,
    individualizingVerbs: overrides.individualizingVerbs ?? base.individualizingVerbs,
    individualizingRoles: overrides.individualizingRoles ?? base.individualizingRoles,
    identificationContexts:
      overrides.identificationContexts ?? base.identificationContexts,
  };
}

/** Parse lexicon overrides from unknown JSON input. */
export function parseLexiconOverrides(input: unknown): LexiconOverrides {
  const parsed = lexiconConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new LexiconNotLoadedError("config", `Invalid lexicon configuration: ${issues}`);
  }
  return parsed.data;
}

/** Load a lexicon override file and merge it into the shipped defaults. */
export function loadLexiconFile(path: string): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const overrides = parseLexiconOverrides(raw);
  return createLexicon(mergeLexiconConfig(defaultLexiconConfig(), overrides));
}
