import type { ComparisonSuite } from "../Benchmark.ts";
import { isComparisonSuite } from "../Benchmark.ts";
import { ConfigurationError } from "../Errors.ts";

/** Load a comparison suite exported by the module at moduleUrl */
export async function loadSuiteModule(
  moduleUrl: string,
  exportName = "suite",
): Promise<ComparisonSuite<unknown>> {
  const module: unknown = await import(moduleUrl);
  const suite = exportedValue(module, exportName);
  if (!isComparisonSuite(suite)) {
    const msg = `Module at ${moduleUrl} must export a comparison suite as '${exportName}'`;
    throw new ConfigurationError(msg);
  }
  return suite;
}

function exportedValue(module: unknown, exportName: string): unknown {
  if (typeof module !== "object" || module === null) return undefined;
  if (!(exportName in module)) return undefined;
  return Reflect.get(module, exportName);
}
