import fs from "fs";
import path from "path";
import { AppError } from "../../shared/utils/errors";
import { logger } from "../../shared/utils/logger";
import {
  DEFAULT_SALARY_RANGE,
  buildPayrollRecord,
  isWholeCents,
  formatRecordLine,
  type SalaryRange
} from "./corpusBuilders";
import { DEFAULT_REFERENCE_LISTS, type ReferenceLists } from "./corpusReferenceData";
import { createRng, type Rng } from "./corpusRng";

export const DEFAULT_OUTPUT_DIR = "ocr_csv_corpus";
export const DEFAULT_FILE_COUNT = 30;
export const DEFAULT_LINES_PER_FILE = 100;

export type CorpusOptions = {
  outputDir: string;
  fileCount?: number;
  linesPerFile?: number;
  salaryRange?: SalaryRange;
  rng?: Rng;
  referenceLists?: ReferenceLists;
  drawTitle?: boolean;
};

export type CorpusResult = {
  outputDir: string;
  resolvedDir: string;
  files: string[];
  linesPerFile: number;
};

const invalid = (message: string) => new AppError(message, { code: "GEN_INVALID" });

const ensurePositiveInt = (value: number, label: string) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(`${label} must be a positive integer`);
  }
};

const ensureSalaryRange = (range: SalaryRange) => {
  if (!isWholeCents(range.min) || !isWholeCents(range.max) || range.min > range.max) {
    throw invalid("Salary range must use whole-cent bounds with min <= max");
  }
};

export const corpusFileName = (index: number) => `ocr_page_${String(index).padStart(2, "0")}.txt`;

export const formatCompletionMessage = (result: CorpusResult) =>
  `Successfully created ${result.files.length} files in the '${result.outputDir}' directory.`;

const writePage = (filePath: string, lineCount: number, nextLine: () => string) => {
  const lines: string[] = [];
  for (let i = 0; i < lineCount; i += 1) lines.push(`${nextLine()}\n`);
  fs.writeFileSync(filePath, lines.join(""), "utf8");
};

/**
 * Writes `fileCount` pages of synthetic payroll lines into `outputDir`, one page at a time.
 * Existing pages with the same names are truncated. Filesystem errors propagate as-is; pages
 * finished before a failure stay on disk.
 */
export const generateCorpus = (options: CorpusOptions): CorpusResult => {
  const fileCount = options.fileCount ?? DEFAULT_FILE_COUNT;
  const linesPerFile = options.linesPerFile ?? DEFAULT_LINES_PER_FILE;
  const salaryRange = options.salaryRange ?? DEFAULT_SALARY_RANGE;
  if (!options.outputDir) throw invalid("Output directory is required");
  ensurePositiveInt(fileCount, "fileCount");
  ensurePositiveInt(linesPerFile, "linesPerFile");
  ensureSalaryRange(salaryRange);

  const rng = options.rng ?? createRng();
  const lists = options.referenceLists ?? DEFAULT_REFERENCE_LISTS;
  const recordOptions = { salaryRange, drawTitle: options.drawTitle ?? false };
  const nextLine = () => formatRecordLine(buildPayrollRecord(rng, lists, recordOptions));

  const resolvedDir = path.resolve(options.outputDir);
  fs.mkdirSync(resolvedDir, { recursive: true });

  const files: string[] = [];
  for (let i = 1; i <= fileCount; i += 1) {
    const filePath = path.join(resolvedDir, corpusFileName(i));
    writePage(filePath, linesPerFile, nextLine);
    files.push(filePath);
    logger.debug("Wrote corpus page", { file: filePath, lines: linesPerFile });
  }

  return { outputDir: options.outputDir, resolvedDir, files, linesPerFile };
};
