/** Label of a candidate span. PERSON spans come from a recognizer, the rest from pattern extraction. */
export type SpanLabel = "PERSON" | "DOCUMENT" | "EMAIL" | "PHONE";

/** Which component produced a span. */
export type SpanExtractor = "pattern" | "spelled" | "recognizer";

/** Identifier family of a DOCUMENT span. */
export type IdentifierKind =
  | "cpf"
  | "rg"
  | "titulo_eleitor"
  | "passaporte"
  | "numero_extenso";

/** A span of the source text proposed as a potential personal-data entity. */
export interface CandidateSpan {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly label: SpanLabel;
  readonly extractor?: SpanExtractor;
  readonly identifierKind?: IdentifierKind;
}

export type ExclusionReason =
  | "exclusion_context"
  | "lei_homenagem"
  | "homenagem"
  | "relatorio_nomeado";

export type VerdictReason =
  | ExclusionReason
  | "individualizing_role"
  | "associated_data"
  | "documento_ou_contato"
  | "no_individualizing_role";

/** Sub-type of an individualizing_role verdict. */
export type RoleKind = "verb" | "role_noun" | "identification_context";

/** Decision for a single span. */
export interface Verdict {
  isPersonalData: boolean;
  reason: VerdictReason;
  detail?: RoleKind;
  /** The phrase or pattern text that triggered the decision. Informational only. */
  evidence?: string;
}

export interface ClassifiedEntity {
  span: CandidateSpan;
  verdict: Verdict;
}

export type DocumentIntent = "has_personal_data" | "public";

/** Aggregate result for one document. */
export interface DocumentResult {
  text: string;
  intent: DocumentIntent;
  confidence: number;
  /** Entities judged to be personal data, ordered by offset. */
  entities: ClassifiedEntity[];
  /** PERSON spans judged not to be personal data. Present in verbose mode only. */
  excluded?: ClassifiedEntity[];
}

/** A lowercased slice of the source text around a span. */
export interface ContextWindow {
  radiusBefore: number;
  radiusAfter: number;
  text: string;
}

/** Radii (in characters, each side) used by the span classifiers. */
export interface WindowRadii {
  narrow: number;
  role: number;
  associated: number;
}

/** Fixed confidence reported per intent. */
export interface ConfidenceLevels {
  personal: number;
  public: number;
}
