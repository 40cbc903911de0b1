import type { ParameterStore, TuningParameter } from "./types.js";
import { PARAMETER_DEFINITIONS } from "./registry.js";

/**
 * Writes the registry default for every parameter that has no version at all.
 * Existing histories are left alone.
 */
export async function seedDefaultParameters(params: {
  store: ParameterStore;
  date: Date | string;
}): Promise<TuningParameter[]> {
  const existing = new Set((await params.store.listParameters()).map((entry) => entry.name));
  const written: TuningParameter[] = [];
  for (const definition of PARAMETER_DEFINITIONS) {
    if (existing.has(definition.name)) {
      continue;
    }
    written.push(
      await params.store.writeNewVersion({
        date: params.date,
        name: definition.name,
        value: definition.defaultValue,
        description: definition.description,
      }),
    );
  }
  return written;
}
