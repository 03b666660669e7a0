import { describe, it, expect } from "vitest";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { evaluate, formatReport } from "../src/evaluate.js";
import { getDefaultClassifier } from "../src/classifier.js";
import { loadTrainingData } from "../src/training-data.js";
import type { TrainingExample } from "../src/training-data.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE = resolve(__dirname, "../test-fixtures/requests.json");

describe("evaluate", () => {
  const { examples } = loadTrainingData(FIXTURE);
  const report = evaluate(getDefaultClassifier(), examples);

  it("scores the fixture", () => {
    expect(report.total).toBe(10);
    expect(report.correct).toBe(8);
    expect(report.accuracy).toBeCloseTo(0.8);
  });

  it("computes per-intent metrics", () => {
    expect(report.byIntent.public.total).toBe(6);
    expect(report.byIntent.public.correct).toBe(5);
    expect(report.byIntent.public.precision).toBeCloseTo(5 / 6);
    expect(report.byIntent.public.recall).toBeCloseTo(5 / 6);
    expect(report.byIntent.public.f1).toBeCloseTo(5 / 6);
    expect(report.byIntent.has_personal_data.total).toBe(4);
    expect(report.byIntent.has_personal_data.correct).toBe(3);
    expect(report.byIntent.has_personal_data.precision).toBeCloseTo(0.75);
    expect(report.byIntent.has_personal_data.recall).toBeCloseTo(0.75);
  });

  it("fills the confusion matrix", () => {
    expect(report.confusion).toEqual({
      public_as_public: 5,
      public_as_personal: 1,
      personal_as_public: 1,
      personal_as_personal: 3,
    });
  });

  it("counts verdict reasons", () => {
    expect(report.reasons.personal).toEqual({
      individualizing_role: 2,
      documento_ou_contato: 2,
    });
    expect(report.reasons.excluded).toEqual({
      exclusion_context: 2,
      lei_homenagem: 1,
      no_individualizing_role: 1,
    });
  });

  it("lists misclassified examples with their first reason", () => {
    expect(report.falseNegatives).toEqual([
      {
        text: "Maria Santos",
        expected: "has_personal_data",
        predicted: "public",
        entityCount: 0,
        kind: "nome_isolado",
        reason: "no_individualizing_role",
      },
    ]);
    expect(report.falsePositives).toEqual([
      {
        text: "Contato da ouvidoria: ouvidoria@example.gov.br",
        expected: "public",
        predicted: "has_personal_data",
        entityCount: 1,
        kind: "contato_institucional",
        reason: "documento_ou_contato",
      },
    ]);
  });

  it("keeps at most 20 errors per list", () => {
    const misses: TrainingExample[] = Array.from({ length: 25 }, () => ({
      text: "Maria Santos",
      intent: "has_personal_data",
      entities: [],
    }));
    const r = evaluate(getDefaultClassifier(), misses);
    expect(r.correct).toBe(0);
    expect(r.falseNegatives).toHaveLength(20);
  });

  it("handles an empty example list", () => {
    const r = evaluate(getDefaultClassifier(), []);
    expect(r.accuracy).toBe(0);
    expect(r.byIntent.public.f1).toBe(0);
  });
});

describe("formatReport", () => {
  it("renders the report", () => {
    const { examples } = loadTrainingData(FIXTURE);
    const lines = formatReport(evaluate(getDefaultClassifier(), examples)).split("\n");
    expect(lines[0]).toBe("Accuracy: 80.00% (8/10)");
    expect(lines[1]).toBe(
      "public: total=6 correct=5 precision=83.33% recall=83.33% f1=83.33%"
    );
    expect(lines[2]).toBe(
      "has_personal_data: total=4 correct=3 precision=75.00% recall=75.00% f1=75.00%"
    );
    expect(lines).toContain("  public → has_personal_data: 1");
    expect(lines.slice(-4)).toEqual([
      "False positives:",
      "  - Contato da ouvidoria: ouvidoria@example.gov.br [documento_ou_contato]",
      "False negatives:",
      "  - Maria Santos [no_individualizing_role]",
    ]);
  });
});
