import { readFileSync } from "node:fs";
import { z } from "zod";
import type { DocumentIntent } from "./types.js";
import { TrainingDataError } from "./errors.js";

const intentSchema = z
  .enum(["has_personal_data", "public", "tem_pii", "publico"])
  .transform((intent): DocumentIntent => {
    switch (intent) {
      case "tem_pii":
        return "has_personal_data";
      case "publico":
        return "public";
      default:
        return intent;
    }
  });

export const trainingEntitySchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().positive(),
  value: z.string(),
  entity: z.string(),
  role: z.string().optional(),
});

export const trainingExampleSchema = z
  .object({
    text: z.string(),
    intent: intentSchema,
    entities: z.array(trainingEntitySchema).default([]),
    kind: z.string().optional(),
  })
  .superRefine((example, ctx) => {
    example.entities.forEach((e, i) => {
      if (e.start >= e.end || e.end > example.text.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entities", i],
          message: `span [${e.start}, ${e.end}) is outside the text`,
        });
      } else if (example.text.slice(e.start, e.end) !== e.value) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entities", i, "value"],
          message: `value does not match text at [${e.start}, ${e.end})`,
        });
      }
    });
  });

export const trainingDocumentSchema = z.object({
  version: z.string(),
  language: z.string(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  examples: z.array(trainingExampleSchema),
});

export type TrainingEntity = z.output<typeof trainingEntitySchema>;
export type TrainingExample = z.output<typeof trainingExampleSchema>;
export type TrainingDocument = z.output<typeof trainingDocumentSchema>;

const legacyWrapperSchema = z.object({
  data: z.object({ common_examples: z.array(z.unknown()) }),
});

/** Lift the older `{data: {common_examples}}` layout to `{examples}`. */
function liftLegacyLayout(input: unknown): unknown {
  if (typeof input !== "object" || input === null || "examples" in input) {
    return input;
  }
  const legacy = legacyWrapperSchema.safeParse(input);
  if (!legacy.success) return input;
  return { ...input, examples: legacy.data.data.common_examples };
}

/** Validate a training-data document. Throws TrainingDataError listing every issue. */
export function parseTrainingData(input: unknown): TrainingDocument {
  const parsed = trainingDocumentSchema.safeParse(liftLegacyLayout(input));
  if (!parsed.success) {
    throw new TrainingDataError(
      parsed.error.issues.map(
        (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
      )
    );
  }
  return parsed.data;
}

export function loadTrainingData(path: string): TrainingDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TrainingDataError([`${path}: ${message}`]);
  }
  return parseTrainingData(raw);
}
