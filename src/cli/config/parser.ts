/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import AjvModule from "ajv";
import type { ValidateFunction } from "ajv";
import { parse as parseYaml } from "yaml";
import { SAMPLING_STRATEGIES } from "../../lib/sampler/index.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { MongoProbeConfig } from "./types.js";

const Ajv = AjvModule.default;

const configSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    source: {
      type: "object",
      additionalProperties: false,
      properties: {
        uri: { type: "string" },
        database: { type: "string" },
        collection: { type: "string" },
      },
    },
    sampling: {
      type: "object",
      additionalProperties: false,
      properties: {
        sampleSize: { type: "integer", minimum: 1 },
        strategy: { type: "string", enum: [...SAMPLING_STRATEGIES] },
      },
    },
    validation: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxDepth: { type: "integer", minimum: 1 },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateConfig: ValidateFunction<MongoProbeConfig> =
  ajv.compile<MongoProbeConfig>(configSchema);

/**
 * Parse and check configuration text; `format` picks the syntax
 */
export function parseConfigContent(
  content: string,
  format: "json" | "yaml",
  source = "<inline>",
): MongoProbeConfig {
  let parsed: unknown;
  try {
    parsed = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${source}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!validateConfig(parsed)) {
    throw new ConfigError(`Invalid configuration in ${source}`, {
      errors: (validateConfig.errors ?? []).map(
        (e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`,
      ),
    });
  }
  return parsed;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): MongoProbeConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = parseConfigContent(content, isYaml ? "yaml" : "json", filePath);

  logger.info("Configuration file parsed successfully", {
    hasSource: config.source !== undefined,
    hasSampling: config.sampling !== undefined,
    hasValidation: config.validation !== undefined,
  });

  return config;
}
