#!/usr/bin/env node

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import type { ClassifierOptions } from "./classifier.js";
import { createClassifier } from "./classifier.js";
import { classifyCsv } from "./batch.js";
import { evaluate, formatReport } from "./evaluate.js";
import { loadLexiconFile } from "./lexicon.js";
import { loadTrainingData } from "./training-data.js";
import { ConsoleLogger, NullRecognizer } from "./ports.js";

const args = process.argv.slice(2);
const logger = new ConsoleLogger();

function usage(): void {
  console.log(`
lai-pii: decide whether access-to-information requests identify a natural person

Usage:
  lai-pii <file>                            Classify a text file, print JSON to stdout
  lai-pii --stdin                           Read the text from stdin
  lai-pii --csv <file> --column <name>      Classify one column of a CSV file
  lai-pii --evaluate <examples.json>        Score labeled examples

Options:
  -o, --output <file>   Write output to file instead of stdout
  --lexicon <json>      Replace lexicon sets (exclusionTerms, individualizingVerbs,
                        individualizingRoles, identificationContexts)
  --verbose             Also list names judged not to be personal data
  --no-names            Skip name recognition (structured identifiers only)
  -h, --help            Show this help
`);
}

function optionValue(...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1 && args[idx + 1] && !args[idx + 1].startsWith("-")) {
      return args[idx + 1];
    }
  }
  return undefined;
}

function readInput(path: string): string {
  if (!existsSync(path)) {
    logger.error(`File not found: ${path}`);
    process.exit(1);
  }
  return readFileSync(path, "utf-8");
}

function writeOutput(content: string, label: string): void {
  const out = optionValue("-o", "--output");
  if (out) {
    writeFileSync(out, content);
    logger.info(`${label} → ${out}`);
  } else {
    process.stdout.write(content.endsWith("\n") ? content : `${content}\n`);
  }
}

function main(): void {
  if (args.length === 0 || args.includes("-h") || args.includes("--help")) {
    usage();
    process.exit(0);
  }

  const lexiconPath = optionValue("--lexicon");
  const options: ClassifierOptions = {
    verbose: args.includes("--verbose"),
    ...(lexiconPath ? { lexicon: loadLexiconFile(lexiconPath) } : {}),
    ...(args.includes("--no-names") ? { recognizer: new NullRecognizer() } : {}),
  };
  const classifier = createClassifier(options);

  // Evaluation mode
  const evalPath = optionValue("--evaluate");
  if (evalPath) {
    const doc = loadTrainingData(evalPath);
    const report = evaluate(classifier, doc.examples);
    writeOutput(formatReport(report), "Report");
    return;
  }

  // Batch mode
  const csvPath = optionValue("--csv");
  if (csvPath) {
    const column = optionValue("--column");
    if (!column) {
      logger.error("Usage: lai-pii --csv <file> --column <name>");
      process.exit(1);
    }
    const { csv, summary } = classifyCsv(readInput(csvPath), {
      column,
      classifier,
      logger,
      onProgress: (done, total) => {
        if (done % 500 === 0 || done === total) logger.info(`${done}/${total} rows`);
      },
    });
    writeOutput(csv, "Classified CSV");
    logger.info(
      `${summary.rows} rows: ${summary.withPersonalData} with personal data, ` +
        `${summary.public} public, ${summary.errors} errors, ` +
        `average confidence ${summary.averageConfidence.toFixed(2)}`
    );
    return;
  }

  // Single document mode
  let text: string;
  if (args.includes("--stdin")) {
    text = readFileSync(0, "utf-8");
  } else {
    const valued = new Set(
      ["-o", "--output", "--lexicon"].map((f) => optionValue(f)).filter(Boolean)
    );
    const inputFile = args.find((a) => !a.startsWith("-") && !valued.has(a));
    if (!inputFile) {
      logger.error("No input file given");
      process.exit(1);
    }
    text = readInput(inputFile);
  }

  const result = classifier.classifyText(text);
  writeOutput(JSON.stringify(result, null, 2), "Result");
  logger.info(
    `${result.intent} (confidence ${result.confidence}), ${result.entities.length} entities`
  );
}

try {
  main();
} catch (err) {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
