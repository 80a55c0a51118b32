import fs from "fs";
import { AppError } from "../../shared/utils/errors";
import bundledLists from "./reference_lists.json";

export type ReferenceLists = {
  readonly firstNames: readonly string[];
  readonly lastNames: readonly string[];
  // Only sampled when the title draw is enabled; never rendered.
  readonly titles: readonly string[];
  readonly agencies: readonly string[];
  readonly cities: readonly string[];
};

const LIST_KEYS = ["firstNames", "lastNames", "titles", "agencies", "cities"] as const;

const invalid = (message: string) => new AppError(message, { code: "REFERENCE_INVALID" });

const readList = (fields: Map<string, unknown>, key: (typeof LIST_KEYS)[number]) => {
  const value = fields.get(key);
  if (!Array.isArray(value)) throw invalid(`Reference list ${key} must be an array`);
  if (!value.length) throw invalid(`Reference list ${key} is empty`);
  const entries: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") throw invalid(`Reference list ${key} contains a non-string entry`);
    entries.push(entry);
  }
  return Object.freeze(entries);
};

export const parseReferenceLists = (value: unknown): ReferenceLists => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw invalid("Reference data must be an object");
  }
  const fields = new Map<string, unknown>(Object.entries(value));
  return Object.freeze({
    firstNames: readList(fields, "firstNames"),
    lastNames: readList(fields, "lastNames"),
    titles: readList(fields, "titles"),
    agencies: readList(fields, "agencies"),
    cities: readList(fields, "cities")
  });
};

export const loadReferenceLists = (filePath: string): ReferenceLists => {
  const text = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new AppError(`Reference data is not valid JSON: ${filePath}`, {
      code: "REFERENCE_INVALID",
      cause: err
    });
  }
  return parseReferenceLists(parsed);
};

export const DEFAULT_REFERENCE_LISTS: ReferenceLists = parseReferenceLists(bundledLists);
