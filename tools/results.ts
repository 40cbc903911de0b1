import { createResultsProgram } from "../src/cli/results.js";
import { createFileAnalysisRepository } from "../src/analysis/store.js";

await createResultsProgram({ repository: createFileAnalysisRepository() }).parseAsync(process.argv);
