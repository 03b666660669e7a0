import type { DocumentIntent, VerdictReason } from "./types.js";
import type { PiiClassifier } from "./classifier.js";
import type { TrainingExample } from "./training-data.js";

export interface IntentMetrics {
  total: number;
  correct: number;
  precision: number;
  recall: number;
  f1: number;
}

export interface ConfusionMatrix {
  public_as_public: number;
  public_as_personal: number;
  personal_as_public: number;
  personal_as_personal: number;
}

export interface EvaluationError {
  text: string;
  expected: DocumentIntent;
  predicted: DocumentIntent;
  entityCount: number;
  kind?: string;
  /** First personal-data reason (false positives) or first exclusion reason (false negatives). */
  reason?: VerdictReason;
}

export interface EvaluationReport {
  total: number;
  correct: number;
  accuracy: number;
  byIntent: Record<DocumentIntent, IntentMetrics>;
  confusion: ConfusionMatrix;
  reasons: {
    personal: Partial<Record<VerdictReason, number>>;
    excluded: Partial<Record<VerdictReason, number>>;
  };
  falsePositives: EvaluationError[];
  falseNegatives: EvaluationError[];
}

const MAX_ERRORS = 20;

function ratio(num: number, den: number): number {
  return den > 0 ? num / den : 0;
}

function bump(counts: Partial<Record<VerdictReason, number>>, reason: VerdictReason): void {
  counts[reason] = (counts[reason] ?? 0) + 1;
}

/**
 * Run labeled examples through classifyText() and score the predicted
 * intents against the labels.
 */
export function evaluate(
  classifier: PiiClassifier,
  examples: readonly TrainingExample[]
): EvaluationReport {
  const counts: Record<DocumentIntent, { total: number; tp: number; fp: number; fn: number }> = {
    has_personal_data: { total: 0, tp: 0, fp: 0, fn: 0 },
    public: { total: 0, tp: 0, fp: 0, fn: 0 },
  };
  const confusion: ConfusionMatrix = {
    public_as_public: 0,
    public_as_personal: 0,
    personal_as_public: 0,
    personal_as_personal: 0,
  };
  const reasons: EvaluationReport["reasons"] = { personal: {}, excluded: {} };
  const falsePositives: EvaluationError[] = [];
  const falseNegatives: EvaluationError[] = [];
  let correct = 0;

  for (const example of examples) {
    const result = classifier.classifyText(example.text, { verbose: true });
    const expected = example.intent;
    const predicted = result.intent;

    counts[expected].total++;
    if (predicted === expected) {
      correct++;
      counts[expected].tp++;
    } else {
      counts[expected].fn++;
      counts[predicted].fp++;
    }

    if (expected === "public") {
      if (predicted === "public") confusion.public_as_public++;
      else confusion.public_as_personal++;
    } else if (predicted === "public") {
      confusion.personal_as_public++;
    } else {
      confusion.personal_as_personal++;
    }

    for (const e of result.entities) bump(reasons.personal, e.verdict.reason);
    for (const e of result.excluded ?? []) bump(reasons.excluded, e.verdict.reason);

    if (predicted === expected) continue;

    const error: EvaluationError = {
      text: example.text,
      expected,
      predicted,
      entityCount: result.entities.length,
      kind: example.kind,
    };
    if (predicted === "has_personal_data") {
      error.reason = result.entities[0]?.verdict.reason;
      if (falsePositives.length < MAX_ERRORS) falsePositives.push(error);
    } else {
      error.reason = result.excluded?.[0]?.verdict.reason;
      if (falseNegatives.length < MAX_ERRORS) falseNegatives.push(error);
    }
  }

  const metrics = (intent: DocumentIntent): IntentMetrics => {
    const c = counts[intent];
    const precision = ratio(c.tp, c.tp + c.fp);
    const recall = ratio(c.tp, c.tp + c.fn);
    return {
      total: c.total,
      correct: c.tp,
      precision,
      recall,
      f1: ratio(2 * precision * recall, precision + recall),
    };
  };

  return {
    total: examples.length,
    correct,
    accuracy: ratio(correct, examples.length),
    byIntent: {
      has_personal_data: metrics("has_personal_data"),
      public: metrics("public"),
    },
    confusion,
    reasons,
    falsePositives,
    falseNegatives,
  };
}

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/** Plain-text rendering of an evaluation report. */
export function formatReport(report: EvaluationReport): string {
  const lines: string[] = [
    `Accuracy: ${pct(report.accuracy)} (${report.correct}/${report.total})`,
  ];

  for (const intent of ["public", "has_personal_data"] as const) {
    const m = report.byIntent[intent];
    lines.push(
      `${intent}: total=${m.total} correct=${m.correct} precision=${pct(m.precision)} recall=${pct(m.recall)} f1=${pct(m.f1)}`
    );
  }

  const c = report.confusion;
  lines.push(
    "Confusion (expected → predicted):",
    `  public → public: ${c.public_as_public}`,
    `  public → has_personal_data: ${c.public_as_personal}`,
    `  has_personal_data → public: ${c.personal_as_public}`,
    `  has_personal_data → has_personal_data: ${c.personal_as_personal}`
  );

  for (const [label, errors] of [
    ["False positives", report.falsePositives],
    ["False negatives", report.falseNegatives],
  ] as const) {
    if (errors.length === 0) continue;
    lines.push(`${label}:`);
    for (const e of errors) {
      lines.push(`  - ${e.text}${e.reason ? ` [${e.reason}]` : ""}`);
    }
  }

  return lines.join("\n");
}
