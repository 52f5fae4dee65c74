export {
  loadConfig,
  loadConfigOrDefaults,
  parseConfig,
  resolveConfigPath,
  type ConfigLoadResult,
} from "./loader";
export { PollbotConfigSchema, type PollbotConfig } from "./schema";
export { replaceEnvVars } from "./env";
