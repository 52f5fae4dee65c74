import { createJiti } from "jiti";
import fs from "node:fs";
import path from "node:path";
import type { CapabilityConfig } from "../config/schema/capability";
import type { PollCapability, PollCapabilityFactory } from "./types";
import { logger } from "../logger";

const FACTORY_EXPORT = "createPollCapability";

export class CapabilityLoadError extends Error {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`Failed to load poll capability from ${source}: ${message}`);
    this.name = "CapabilityLoadError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function isPollCapability(value: unknown): value is PollCapability {
  return (
    isRecord(value) &&
    typeof value.authenticate === "function" &&
    typeof value.detectNewPoll === "function" &&
    typeof value.submitAnswer === "function"
  );
}

function isFactory(value: unknown): value is PollCapabilityFactory {
  return typeof value === "function";
}

/**
 * Picks the capability out of a loaded module: a named `createPollCapability`
 * factory, a default-exported factory, or a default-exported capability object.
 */
export async function resolveCapabilityExport(
  rawModule: unknown,
  options: Record<string, unknown>,
  source: string,
): Promise<PollCapability> {
  const candidates: unknown[] = [];
  if (isRecord(rawModule)) {
    candidates.push(rawModule[FACTORY_EXPORT], rawModule.default);
  }
  candidates.push(rawModule);

  for (const candidate of candidates) {
    if (isPollCapability(candidate)) {
      return candidate;
    }
    if (isFactory(candidate)) {
      const created = await candidate(options);
      if (!isPollCapability(created)) {
        throw new CapabilityLoadError(
          source,
          "factory did not return an object with authenticate, detectNewPoll and submitAnswer",
        );
      }
      return created;
    }
  }

  throw new CapabilityLoadError(
    source,
    `module must export ${FACTORY_EXPORT}(options) or a default capability`,
  );
}

export async function loadPollCapability(config: CapabilityConfig): Promise<PollCapability> {
  const source = path.resolve(config.module);
  if (!fs.existsSync(source)) {
    throw new CapabilityLoadError(source, "file not found");
  }

  const jitiLoader = createJiti(import.meta.url, {
    interopDefault: true,
    extensions: [".ts", ".mts", ".cts", ".mjs", ".cjs", ".js"],
  });

  let rawModule: unknown;
  try {
    rawModule = await jitiLoader.import(source);
  } catch (error) {
    throw new CapabilityLoadError(source, error instanceof Error ? error.message : String(error));
  }

  let capability: PollCapability;
  try {
    capability = await resolveCapabilityExport(rawModule, config.options ?? {}, source);
  } catch (error) {
    if (error instanceof CapabilityLoadError) {
      throw error;
    }
    throw new CapabilityLoadError(source, error instanceof Error ? error.message : String(error));
  }
  logger.debug({ source }, "Poll capability loaded");
  return capability;
}
