/**
 * CSV tick loader
 * Reads "timestamp,price" rows; timestamps may be epoch milliseconds or ISO dates.
 * A first row whose price column is not numeric is treated as a header.
 */

import { promises as fs } from "fs";
import { parse } from "csv-parse";
import { Tick } from "../types";
import { parseTimestamp } from "../utils/timeUtils";

interface CsvRow {
  line: number;
  fields: string[];
}

function toRow(value: unknown): CsvRow | null {
  if (typeof value !== "object" || value === null || !("record" in value) || !("info" in value)) {
    return null;
  }
  const { record, info } = value;
  if (!Array.isArray(record) || typeof info !== "object" || info === null || !("lines" in info)) {
    return null;
  }
  return {
    line: typeof info.lines === "number" ? info.lines : NaN,
    fields: record.map((field: unknown) => String(field)),
  };
}

function readRows(content: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        comment: "#",
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
        info: true,
      },
      (err, records: unknown[] | undefined) => {
        if (err) {
          reject(err);
          return;
        }
        const rows: CsvRow[] = [];
        for (const record of records ?? []) {
          const row = toRow(record);
          if (row) rows.push(row);
        }
        resolve(rows);
      }
    );
  });
}

function parsePrice(text: string): number {
  return text === "" ? NaN : Number(text);
}

export async function parseTicksCsv(content: string, source: string = "<csv>"): Promise<Tick[]> {
  const rows = await readRows(content);
  const ticks: Tick[] = [];

  rows.forEach(({ line, fields }, index) => {
    const [timeText = "", priceText = ""] = fields;
    const price = parsePrice(priceText);

    if (index === 0 && Number.isNaN(price)) {
      return; // header
    }

    const timestamp = parseTimestamp(timeText);
    if (Number.isNaN(timestamp) || Number.isNaN(price)) {
      throw new Error(`${source}:${line}: malformed tick row "${fields.join(",")}"`);
    }
    ticks.push({ timestamp, price });
  });

  return ticks;
}

export async function loadTicksFromCsv(filePath: string): Promise<Tick[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      throw new Error(`Tick file not found: ${filePath}`);
    }
    throw error;
  }
  return parseTicksCsv(content, filePath);
}
