import { createParametersProgram } from "../src/cli/parameters.js";
import { createFileParameterStore } from "../src/tuning/store.js";

await createParametersProgram({ store: createFileParameterStore() }).parseAsync(process.argv);
