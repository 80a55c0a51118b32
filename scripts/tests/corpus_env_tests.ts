import assert from "assert";
import { describe, it } from "node:test";
import { isAppError } from "../../shared/utils/errors";
import { loadCorpusEnv } from "../../ops/synthetic-data/corpusEnv";

const isEnvError = (err: unknown) => isAppError(err) && err.code === "ENV_INVALID";

describe("loadCorpusEnv", () => {
  it("falls back to the fixed corpus layout", () => {
    assert.deepStrictEqual(loadCorpusEnv({}), {
      outputDir: "ocr_csv_corpus",
      fileCount: 30,
      linesPerFile: 100,
      salaryMin: 800,
      salaryMax: 1200,
      seed: undefined,
      drawTitle: false,
      referenceListsPath: undefined,
      logLevel: "info"
    });
  });

  it("reads every override", () => {
    const env = loadCorpusEnv({
      OCR_CORPUS_OUTPUT_DIR: "tmp/pages",
      OCR_CORPUS_FILE_COUNT: "3",
      OCR_CORPUS_LINES_PER_FILE: "12",
      OCR_CORPUS_SALARY_MIN: "900.5",
      OCR_CORPUS_SALARY_MAX: "950",
      OCR_CORPUS_SEED: " demo ",
      OCR_CORPUS_DRAW_TITLE: "TRUE",
      OCR_CORPUS_REFERENCE_LISTS: "fixtures/lists.json",
      LOG_LEVEL: "Debug"
    });
    assert.deepStrictEqual(env, {
      outputDir: "tmp/pages",
      fileCount: 3,
      linesPerFile: 12,
      salaryMin: 900.5,
      salaryMax: 950,
      seed: "demo",
      drawTitle: true,
      referenceListsPath: "fixtures/lists.json",
      logLevel: "debug"
    });
  });

  it("treats blank values as unset", () => {
    const env = loadCorpusEnv({ OCR_CORPUS_OUTPUT_DIR: "  ", OCR_CORPUS_FILE_COUNT: "" });
    assert.strictEqual(env.outputDir, "ocr_csv_corpus");
    assert.strictEqual(env.fileCount, 30);
  });

  it("rejects non-positive or fractional counts", () => {
    assert.throws(() => loadCorpusEnv({ OCR_CORPUS_FILE_COUNT: "0" }), isEnvError);
    assert.throws(() => loadCorpusEnv({ OCR_CORPUS_LINES_PER_FILE: "2.5" }), isEnvError);
    assert.throws(() => loadCorpusEnv({ OCR_CORPUS_FILE_COUNT: "many" }), isEnvError);
  });

  it("rejects an inverted salary range", () => {
    assert.throws(
      () => loadCorpusEnv({ OCR_CORPUS_SALARY_MIN: "1300", OCR_CORPUS_SALARY_MAX: "1200" }),
      isEnvError
    );
  });

  it("rejects salary bounds finer than a cent", () => {
    assert.throws(
      () => loadCorpusEnv({ OCR_CORPUS_SALARY_MIN: "800.001", OCR_CORPUS_SALARY_MAX: "800.009" }),
      isEnvError
    );
  });

  it("rejects unknown flags and log levels", () => {
    assert.throws(() => loadCorpusEnv({ OCR_CORPUS_DRAW_TITLE: "yes" }), isEnvError);
    assert.throws(() => loadCorpusEnv({ LOG_LEVEL: "trace" }), isEnvError);
  });
});
