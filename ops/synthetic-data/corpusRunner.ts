import { setLogLevel } from "../../shared/utils/logger";
import { loadCorpusEnv } from "./corpusEnv";
import { DEFAULT_REFERENCE_LISTS, loadReferenceLists } from "./corpusReferenceData";
import { createRng } from "./corpusRng";
import { formatCompletionMessage, generateCorpus, type CorpusResult } from "./generateCorpus";

/** Generates the corpus from environment settings and prints the completion notice. */
export const runCorpusGenerator = (envVars: NodeJS.ProcessEnv = process.env): CorpusResult => {
  const env = loadCorpusEnv(envVars);
  setLogLevel(env.logLevel);

  const result = generateCorpus({
    outputDir: env.outputDir,
    fileCount: env.fileCount,
    linesPerFile: env.linesPerFile,
    salaryRange: { min: env.salaryMin, max: env.salaryMax },
    rng: createRng(env.seed),
    referenceLists: env.referenceListsPath
      ? loadReferenceLists(env.referenceListsPath)
      : DEFAULT_REFERENCE_LISTS,
    drawTitle: env.drawTitle
  });

  // Program output, not a diagnostic: LOG_LEVEL does not apply.
  console.log(formatCompletionMessage(result));
  return result;
};
