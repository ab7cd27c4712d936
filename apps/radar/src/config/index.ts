import { buildEngineConfig, loadTaxonomyFile } from "./engine";
import { config } from "./env";

export { config };
export type { AppConfig, ToolLimits } from "./env";

export const engineConfig = buildEngineConfig({
  taxonomy: config.scoring.taxonomyFile
    ? loadTaxonomyFile(config.scoring.taxonomyFile)
    : undefined,
  weights: config.scoring.weights,
  problemThreshold: config.scoring.problemThreshold,
});
