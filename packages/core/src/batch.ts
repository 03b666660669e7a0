import * as XLSX from "xlsx";
import type { PiiClassifier } from "./classifier.js";
import type { Logger } from "./ports.js";
import { getDefaultClassifier } from "./classifier.js";
import { BatchInputError } from "./errors.js";
import { ConsoleLogger } from "./ports.js";

/** Columns appended to every row, in order. */
export const RESULT_COLUMNS = [
  "intent",
  "confidence",
  "entity_count",
  "has_personal_data_flag",
] as const;

/** Values written into a row whose classification failed. */
export const ERROR_ROW_VALUES = ["error", -1, -1, -1] as const;

export interface BatchOptions {
  /** Header of the column holding the request text. */
  column: string;
  classifier?: PiiClassifier;
  logger?: Logger;
  /** Called after each row with the number of rows done so far. */
  onProgress?: (completed: number, total: number) => void;
}

export interface BatchSummary {
  rows: number;
  withPersonalData: number;
  public: number;
  errors: number;
  averageConfidence: number;
}

export interface BatchResult {
  csv: string;
  summary: BatchSummary;
}

type Cell = string | number;

function readTable(csv: string): Cell[][] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(csv, { type: "string", raw: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BatchInputError(`Cannot parse CSV: ${message}`);
  }

  const sheet =
    workbook.SheetNames.length > 0 ? workbook.Sheets[workbook.SheetNames[0]] : undefined;
  if (!sheet) throw new BatchInputError("CSV input is empty");

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: false,
  });
  return rows.map((row) =>
    row.map((cell): Cell => (typeof cell === "number" ? cell : String(cell ?? "")))
  );
}

/**
 * Classify one text column of a CSV document and append the result
 * columns. A row that fails is logged and marked with ERROR_ROW_VALUES;
 * the remaining rows are still processed.
 */
export function classifyCsv(csv: string, options: BatchOptions): BatchResult {
  const classifier = options.classifier ?? getDefaultClassifier();
  const logger = options.logger ?? new ConsoleLogger();

  const table = readTable(csv);
  if (table.length === 0) throw new BatchInputError("CSV input is empty");

  const [header, ...rows] = table;
  const columnIndex = header.findIndex((h) => String(h).trim() === options.column);
  if (columnIndex === -1) {
    throw new BatchInputError(
      `Column "${options.column}" not found (available: ${header.join(", ")})`
    );
  }

  const output: Cell[][] = [[...header, ...RESULT_COLUMNS]];
  const summary: BatchSummary = {
    rows: rows.length,
    withPersonalData: 0,
    public: 0,
    errors: 0,
    averageConfidence: 0,
  };
  let confidenceSum = 0;

  rows.forEach((row, i) => {
    const cells = Array.from({ length: header.length }, (_, c) => row[c] ?? "");
    const text = String(cells[columnIndex]);

    try {
      const result = classifier.classifyText(text);
      const flag = result.intent === "has_personal_data" ? 1 : 0;
      output.push([...cells, result.intent, result.confidence, result.entities.length, flag]);
      if (flag) summary.withPersonalData++;
      else summary.public++;
      confidenceSum += result.confidence;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`row ${i + 1}: ${message}`);
      output.push([...cells, ...ERROR_ROW_VALUES]);
      summary.errors++;
    }

    options.onProgress?.(i + 1, rows.length);
  });

  const classified = summary.withPersonalData + summary.public;
  summary.averageConfidence = classified > 0 ? confidenceSum / classified : 0;

  const sheet = XLSX.utils.aoa_to_sheet(output);
  return { csv: XLSX.utils.sheet_to_csv(sheet), summary };
}
