import * as csv from "csv-parse/sync";
import fs from "fs";
import { CsvRow, CsvTable } from "./types";

const isCsvRow = (value: unknown): value is CsvRow =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((cell) => typeof cell === "string");

export const load = (path: string): CsvTable => {
  const records: unknown = csv.parse(fs.readFileSync(path, "utf8"), {
    columns: true,
    skip_empty_lines: true,
    delimiter: ",",
    // a run killed mid-write leaves a short last row; its missing cells read as absent
    relax_column_count: true,
  });

  if (!Array.isArray(records)) {
    throw new Error(`${path} did not parse into a list of rows`);
  }

  return records.filter(isCsvRow);
};

export const loadIfExists = (path: string | undefined): CsvTable | undefined => {
  if (path === undefined || !fs.existsSync(path)) {
    return undefined;
  }

  return load(path);
};

export const save = (path: string, content: string) => {
  fs.writeFileSync(path, content);
};
