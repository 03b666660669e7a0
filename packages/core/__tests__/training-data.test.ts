import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseTrainingData, loadTrainingData } from "../src/training-data.js";
import { TrainingDataError } from "../src/errors.js";

describe("parseTrainingData", () => {
  it("accepts the interchange format and defaults entities", () => {
    const doc = parseTrainingData({
      version: "1.0",
      language: "pt",
      examples: [{ text: "Maria Santos", intent: "public" }],
    });
    expect(doc.examples).toEqual([{ text: "Maria Santos", intent: "public", entities: [] }]);
  });

  it("maps legacy intent names", () => {
    const doc = parseTrainingData({
      version: "1.0",
      language: "pt",
      examples: [
        { text: "a", intent: "tem_pii" },
        { text: "b", intent: "publico" },
      ],
    });
    expect(doc.examples.map((e) => e.intent)).toEqual(["has_personal_data", "public"]);
  });

  it("lifts the legacy common_examples layout", () => {
    const doc = parseTrainingData({
      version: "0.9",
      language: "pt",
      data: { common_examples: [{ text: "Rua Maria Santos", intent: "publico" }] },
    });
    expect(doc.examples).toHaveLength(1);
    expect(doc.examples[0].intent).toBe("public");
  });

  it("checks entity offsets against the text", () => {
    const input = {
      version: "1.0",
      language: "pt",
      examples: [
        {
          text: "João Silva solicitou",
          intent: "has_personal_data",
          entities: [
            { start: 0, end: 10, value: "João Silv", entity: "PESSOA" },
            { start: 5, end: 99, value: "Silva", entity: "PESSOA" },
          ],
        },
      ],
    };
    expect(() => parseTrainingData(input)).toThrow(TrainingDataError);
    try {
      parseTrainingData(input);
    } catch (err) {
      expect(err).toBeInstanceOf(TrainingDataError);
      if (err instanceof TrainingDataError) {
        expect(err.issues).toEqual([
          "examples.0.entities.0.value: value does not match text at [0, 10)",
          "examples.0.entities.1: span [5, 99) is outside the text",
        ]);
      }
    }
  });

  it("rejects unknown intents", () => {
    expect(() =>
      parseTrainingData({
        version: "1.0",
        language: "pt",
        examples: [{ text: "x", intent: "maybe" }],
      })
    ).toThrow(/examples\.0\.intent/);
  });

  it("reports a missing document as a root issue", () => {
    expect(() => parseTrainingData(null)).toThrow("Invalid training data: (root):");
  });
});

describe("loadTrainingData", () => {
  it("reads a file", () => {
    const dir = mkdtempSync(join(tmpdir(), "lai-pii-"));
    const path = join(dir, "examples.json");
    writeFileSync(
      path,
      JSON.stringify({ version: "1.0", language: "pt", examples: [{ text: "x", intent: "public" }] })
    );
    expect(loadTrainingData(path).examples).toHaveLength(1);
  });

  it("wraps unreadable files", () => {
    expect(() => loadTrainingData("/nonexistent/examples.json")).toThrow(TrainingDataError);
  });
});
