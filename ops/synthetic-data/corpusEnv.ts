import { AppError } from "../../shared/utils/errors";
import { isLogLevel, type LogLevel } from "../../shared/utils/logger";
import { DEFAULT_SALARY_RANGE, isWholeCents } from "./corpusBuilders";
import { DEFAULT_FILE_COUNT, DEFAULT_LINES_PER_FILE, DEFAULT_OUTPUT_DIR } from "./generateCorpus";

export type CorpusEnvConfig = {
  outputDir: string;
  fileCount: number;
  linesPerFile: number;
  salaryMin: number;
  salaryMax: number;
  seed?: string;
  drawTitle: boolean;
  referenceListsPath?: string;
  logLevel: LogLevel;
};

const invalidEnv = (name: string) =>
  new AppError(`Invalid env value: ${name}`, { code: "ENV_INVALID" });

const optional = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const asInt = (value: string | undefined, name: string, fallback: number) => {
  const raw = optional(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) throw invalidEnv(name);
  return parsed;
};

const asAmount = (value: string | undefined, name: string, fallback: number) => {
  const raw = optional(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!isWholeCents(parsed) || parsed < 0) throw invalidEnv(name);
  return parsed;
};

const asBool = (value: string | undefined, name: string) => {
  const raw = optional(value)?.toLowerCase();
  if (raw === undefined || raw === "false") return false;
  if (raw === "true") return true;
  throw invalidEnv(name);
};

export const loadCorpusEnv = (env: NodeJS.ProcessEnv = process.env): CorpusEnvConfig => {
  const outputDir = optional(env.OCR_CORPUS_OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR;
  const fileCount = asInt(env.OCR_CORPUS_FILE_COUNT, "OCR_CORPUS_FILE_COUNT", DEFAULT_FILE_COUNT);
  const linesPerFile = asInt(
    env.OCR_CORPUS_LINES_PER_FILE,
    "OCR_CORPUS_LINES_PER_FILE",
    DEFAULT_LINES_PER_FILE
  );
  const salaryMin = asAmount(env.OCR_CORPUS_SALARY_MIN, "OCR_CORPUS_SALARY_MIN", DEFAULT_SALARY_RANGE.min);
  const salaryMax = asAmount(env.OCR_CORPUS_SALARY_MAX, "OCR_CORPUS_SALARY_MAX", DEFAULT_SALARY_RANGE.max);
  if (salaryMin > salaryMax) throw invalidEnv("OCR_CORPUS_SALARY_MIN");

  const logLevel = optional(env.LOG_LEVEL)?.toLowerCase() ?? "info";
  if (!isLogLevel(logLevel)) throw invalidEnv("LOG_LEVEL");

  return {
    outputDir,
    fileCount,
    linesPerFile,
    salaryMin,
    salaryMax,
    seed: optional(env.OCR_CORPUS_SEED),
    drawTitle: asBool(env.OCR_CORPUS_DRAW_TITLE, "OCR_CORPUS_DRAW_TITLE"),
    referenceListsPath: optional(env.OCR_CORPUS_REFERENCE_LISTS),
    logLevel
  };
};
