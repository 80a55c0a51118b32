import dotenv from "dotenv";
dotenv.config();
import { logger } from "../../shared/utils/logger";
import { runCorpusGenerator } from "./corpusRunner";

// Example usage:
// npm run generate
// OCR_CORPUS_SEED=demo OCR_CORPUS_OUTPUT_DIR=tmp/corpus npm run generate
//
// Sample line:
// Smith, James, Department of Defense $1043.27 Seattle

try {
  runCorpusGenerator();
} catch (err) {
  logger.error(err);
  process.exit(1);
}
