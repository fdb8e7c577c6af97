export { buildDataset, type BuildOptions, type BuildResult } from "./pipeline.js";
