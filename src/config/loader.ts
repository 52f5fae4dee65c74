import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { PollbotConfigSchema, type PollbotConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: PollbotConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("~")) {
    return raw;
  }
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.POLLBOT_CONFIG;
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".pollbot", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown, configDir: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (isRecord(obj.capability) && typeof obj.capability.module === "string") {
    const capability = { ...obj.capability };
    const modulePath = expandHomePath(String(capability.module));
    capability.module = path.isAbsolute(modulePath)
      ? modulePath
      : path.resolve(configDir, modulePath);
    obj.capability = capability;
  }

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
    return obj;
  }

  if (isRecord(obj.logging)) {
    const logging = { ...obj.logging };
    if (!Object.hasOwn(logging, "level")) {
      logging.level = "info";
    }
    obj.logging = logging;
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  const envFiles = [".env", ".env.local"];

  for (const envFile of envFiles) {
    const envPath = path.join(configDir, envFile);
    if (!fs.existsSync(envPath)) {
      continue;
    }
    const result = loadDotEnv({ path: envPath, override: false, quiet: true });
    if (result.error) {
      throw result.error;
    }
  }
}

/**
 * Validates an already-parsed config object. Used for the built-in defaults when no
 * config file exists, and by `loadConfig` after substitution.
 */
export function parseConfig(raw: unknown, sourcePath: string): ConfigLoadResult {
  const prepared = applyConfigDefaults(raw, path.dirname(sourcePath));
  const result = PollbotConfigSchema.safeParse(prepared);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return { success: false, errors, path: sourcePath };
  }
  return { success: true, config: result.data, path: sourcePath };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const parseErrors: ParseError[] = [];
    const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      return {
        success: false,
        errors: parseErrors.map(
          (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
        ),
        path: resolvedPath,
      };
    }
    return parseConfig(replaceEnvVars(parsed), resolvedPath);
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}

/**
 * Loads the config file, falling back to built-in defaults when the default location
 * has no file. An explicitly requested path that does not exist stays an error.
 */
export function loadConfigOrDefaults(configPath?: string): ConfigLoadResult {
  const explicit = Boolean(configPath || process.env.POLLBOT_CONFIG);
  const resolvedPath = resolveConfigPath(configPath);
  if (!explicit && !fs.existsSync(resolvedPath)) {
    return parseConfig({}, resolvedPath);
  }
  return loadConfig(configPath);
}
