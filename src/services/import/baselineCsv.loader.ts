import { promises as fs } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { RawRow } from "../../types/facility.types";

const gridSchema = z.array(z.array(z.string()));

/**
 * Parse baseline CSV text into raw rows, header excluded.
 *
 * Cells stay plain text and every row keeps the number of fields it was written
 * with, so short and over-long rows reach the importer as they are. Blank lines
 * are dropped.
 */
export function parseBaselineCsv(text: string): RawRow[] {
  const grid = gridSchema.parse(
    parse(text, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    }),
  );

  return grid.slice(1).filter((row) => row.some((value) => value.trim() !== ""));
}

export async function loadBaselineCsv(filePath: string): Promise<RawRow[]> {
  const text = await fs.readFile(filePath, "utf8");
  return parseBaselineCsv(text);
}
