import fs from "fs";
import csvParser from "csv-parser";
import { z } from "zod";

export type CsvValue = string | number | null | undefined;

const CsvRowSchema = z.record(z.string());

export type CsvRow = z.infer<typeof CsvRowSchema>;

function escapeField(value: CsvValue): string {
  if (value === null || value === undefined) return "";

  const text =
    typeof value === "number"
      ? Number.isFinite(value) ? String(value) : ""
      : value;

  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serializes rows with a header line. Missing and non-finite values become empty fields.
 */
export function toCsv<K extends string>(
  columns: readonly K[],
  rows: ReadonlyArray<Record<K, CsvValue>>
): string {
  const lines = [
    columns.map(column => escapeField(column)).join(","),
    ...rows.map(row => columns.map(column => escapeField(row[column])).join(",")),
  ];

  return `${lines.join("\n")}\n`;
}

/**
 * Reads a headed CSV file into plain string records using csv-parser.
 */
export async function readCsvRows(filePath: string): Promise<CsvRow[]> {
  const rows: CsvRow[] = [];

  const stream = fs.createReadStream(filePath).pipe(csvParser());

  for await (const row of stream) {
    rows.push(CsvRowSchema.parse(row));
  }

  return rows;
}
