import { describe, it, expect } from "vitest";
import { createClassifier, classifyText, classify } from "../src/classifier.js";
import { createLexicon, defaultLexiconConfig, mergeLexiconConfig } from "../src/lexicon.js";
import { NullRecognizer } from "../src/ports.js";
import type { EntityRecognizer } from "../src/ports.js";
import type { CandidateSpan } from "../src/types.js";
import { InvalidOptionsError, InvalidSpanError } from "../src/errors.js";

const SHOWCASE_REQUEST =
  "Prezados, boa noite. Na qualidade de representante da BIOCASA COMERCIO DE MATERIAL " +
  "FISIOTERÁPICO LTDA - ME, solicito, gentilmente, o envio dos Processos Administrativos, " +
  "extratos, bem como quaisquer outras informações relativas às Certidões de Dívida Ativa " +
  "nº 1000258954 e 0002574863. Agradeço a disponibilidade e aguardo o retorno. Atenciosamente,";

function span(text: string, fragment: string, label: CandidateSpan["label"] = "PERSON"): CandidateSpan {
  const start = text.indexOf(fragment);
  return { start, end: start + fragment.length, text: fragment, label };
}

describe("classifyText", () => {
  it.each([
    ["Hospital Dr. João Silva", "public", 0.85],
    ["Rua Maria Santos", "public", 0.85],
    ["Lei Carlos Alberto", "public", 0.85],
    ["João Silva solicitou acesso", "has_personal_data", 0.9],
    ["Requerente: Maria Santos", "has_personal_data", 0.9],
    ["CPF: 123.456.789-00", "has_personal_data", 0.9],
    ["Maria Santos", "public", 0.85],
  ])("%s → %s", (text, intent, confidence) => {
    const result = classifyText(text);
    expect(result.intent).toBe(intent);
    expect(result.confidence).toBe(confidence);
  });

  it("reports why names were excluded in verbose mode", () => {
    const result = classifyText("Lei Carlos Alberto", { verbose: true });
    expect(result.excluded).toEqual([
      {
        span: { start: 0, end: 18, text: "Lei Carlos Alberto", label: "PERSON", extractor: "recognizer" },
        verdict: { isPersonalData: false, reason: "lei_homenagem", evidence: "lei carlos alberto" },
      },
    ]);
  });

  it("omits excluded entities unless verbose", () => {
    const result = classifyText("Maria Santos");
    expect(result.entities).toEqual([]);
    expect("excluded" in result).toBe(false);
  });

  it("explains a role verdict", () => {
    const result = classifyText("Requerente: Maria Santos");
    expect(result.entities).toHaveLength(1);
    expect(result.entities[0].span.text).toBe("Maria Santos");
    expect(result.entities[0].verdict).toEqual({
      isPersonalData: true,
      reason: "individualizing_role",
      detail: "role_noun",
      evidence: "requerente",
    });
  });

  it("finds a role stated a clause before the name", () => {
    const result = classifyText(
      "Na qualidade de representante da BIOCASA, João Silva solicita informações"
    );
    expect(result.intent).toBe("has_personal_data");
    expect(result.entities[0].verdict).toMatchObject({
      detail: "role_noun",
      evidence: "representante",
    });
  });

  it("orders entities by offset", () => {
    const result = classifyText("Maria Santos solicitou cópia. CPF 123.456.789-00");
    expect(result.entities.map((e) => [e.span.label, e.span.start])).toEqual([
      ["PERSON", 0],
      ["DOCUMENT", 34],
    ]);
  });

  it("keeps a requester citing the access-to-information law", () => {
    const result = classifyText(
      "Com base na Lei de Acesso à Informação, João Silva solicitou cópia do contrato"
    );
    expect(result.intent).toBe("has_personal_data");
    expect(result.entities.map((e) => [e.span.text, e.verdict.reason])).toEqual([
      ["João Silva", "individualizing_role"],
    ]);
  });

  it("does not take a year range for a phone number", () => {
    const result = classifyText(
      "Solicito os contratos de limpeza vigentes no período 2019-2023"
    );
    expect(result.intent).toBe("public");
    expect(result.entities).toEqual([]);
  });

  it("finds no person in a request made on behalf of a company", () => {
    const result = classifyText(SHOWCASE_REQUEST, { verbose: true });
    expect(result.intent).toBe("public");
    expect(result.entities).toEqual([]);
    expect(result.excluded).toEqual([]);
  });

  it("reads decomposed accents as their composed form", () => {
    const text = "Requerente: João Silva".normalize("NFD");
    const result = classifyText(text);
    expect(result.text).toBe(text.normalize("NFC"));
    expect(result.intent).toBe("has_personal_data");
    expect(result.entities[0].span).toMatchObject({
      start: 12,
      end: 22,
      text: "João Silva".normalize("NFC"),
    });
  });

  it("is idempotent", () => {
    const text = "João Silva solicitou acesso. Rua Maria Santos";
    expect(classifyText(text, { verbose: true })).toEqual(classifyText(text, { verbose: true }));
  });
});

describe("createClassifier", () => {
  it("uses the configured recognizer", () => {
    const classifier = createClassifier({ recognizer: new NullRecognizer() });
    const result = classifier.classifyText("João Silva solicitou acesso");
    expect(result.intent).toBe("public");
    expect(result.entities).toEqual([]);
  });

  it("ignores single-word PERSON spans from a recognizer", () => {
    const recognizer: EntityRecognizer = {
      recognize: () => [{ start: 0, end: 5, text: "Maria", label: "PERSON" }],
    };
    const result = createClassifier({ recognizer }).classifyText("Maria solicitou");
    expect(result.intent).toBe("public");
  });

  it("applies confidence overrides", () => {
    const classifier = createClassifier({ confidence: { public: 0.5 } });
    expect(classifier.classifyText("Maria Santos").confidence).toBe(0.5);
    expect(classifier.classifyText("João Silva solicitou acesso").confidence).toBe(0.9);
  });

  it("rejects confidence levels outside [0, 1]", () => {
    expect(() => createClassifier({ confidence: { personal: 1.5 } })).toThrow(
      InvalidOptionsError
    );
    expect(() => createClassifier({ confidence: { public: -0.1 } })).toThrow(
      /confidence\.public/
    );
    const bounds = createClassifier({ confidence: { personal: 1, public: 0 } });
    expect(bounds.classifyText("Maria Santos").confidence).toBe(0);
  });

  it("uses a custom lexicon", () => {
    const lexicon = createLexicon(
      mergeLexiconConfig(defaultLexiconConfig(), { individualizingVerbs: ["telefonou"] })
    );
    const text = "Maria Santos telefonou";
    expect(classifyText(text).intent).toBe("public");
    expect(createClassifier({ lexicon }).classifyText(text).entities[0].verdict).toEqual({
      isPersonalData: true,
      reason: "individualizing_role",
      detail: "verb",
      evidence: "telefonou",
    });
  });

  it("applies verbose set at composition time", () => {
    const result = createClassifier({ verbose: true }).classifyText("Maria Santos");
    expect(result.excluded).toHaveLength(1);
  });
});

describe("classify", () => {
  it("never lets a role override an exclusion", () => {
    const text = "Hospital Maria Santos solicitou";
    const result = classify(text, [span(text, "Maria Santos")]);
    expect(result.intent).toBe("public");
  });

  it("only gains personal data when spans are added", () => {
    const text = "Hospital Dr. João Silva, CPF 123.456.789-00";
    const person = span(text, "João Silva");
    expect(classify(text, [person]).intent).toBe("public");
    expect(classify(text, [person, span(text, "123.456.789-00", "DOCUMENT")]).intent).toBe(
      "has_personal_data"
    );
  });

  it("rejects invalid spans before deciding any", () => {
    const text = "Maria Santos";
    expect(() =>
      classify(text, [span(text, "Maria Santos"), { start: 5, end: 40, text: "x", label: "PERSON" }])
    ).toThrow(InvalidSpanError);
  });

  it("returns public for no spans", () => {
    expect(classify("Bom dia", [])).toEqual({
      text: "Bom dia",
      intent: "public",
      confidence: 0.85,
      entities: [],
    });
  });
});
