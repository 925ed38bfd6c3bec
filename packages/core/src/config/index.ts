export type { LoadConfigOptions } from "./loader";
export { applyEnvOverrides, CONFIG_FILE_NAME, loadTetherConfig, mergeConfig, substituteTemplates } from "./loader";
export type { TetherConfig } from "./schema";
export { DEFAULT_CONFIG, TetherConfigSchema } from "./schema";
