import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { ConfigError, describeError } from "../errors";
import { EffortLevel } from "../types";
import { validateJson } from "../validation/validate";

export type TriggerConfig = {
  vocabulary: string[];
  conjunctions: string[];
  simpleMaxTokens: number;
  moderateMaxTokens: number;
};

export type GateConfig = {
  maxClarificationMarkers: number;
  technologyTerms: string[];
};

export type ClientConfig = {
  endpoint: string;
  apiKeyEnv: string;
  effort: EffortLevel;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  pollIntervalMs: number;
};

export type WorkflowConfig = {
  maxIterations: number;
  trigger: TriggerConfig;
  gate: GateConfig;
  client: ClientConfig;
};

type ConfigFile = {
  max_iterations?: number;
  trigger?: {
    vocabulary?: string[];
    conjunctions?: string[];
    simple_max_tokens?: number;
    moderate_max_tokens?: number;
  };
  gate?: {
    max_clarification_markers?: number;
    technology_terms?: string[];
  };
  client?: {
    endpoint?: string;
    api_key_env?: string;
    effort?: EffortLevel;
    max_attempts?: number;
    base_delay_ms?: number;
    max_delay_ms?: number;
    timeout_ms?: number;
    poll_interval_ms?: number;
  };
};

export const CONFIG_FILE_NAME = "specloop.yml";

export function defaultConfig(): WorkflowConfig {
  return {
    maxIterations: 3,
    trigger: {
      vocabulary: [
        "create",
        "build",
        "develop",
        "design",
        "implement",
        "architect",
        "reflect",
        "think",
        "créer",
        "construire",
        "développer",
        "concevoir",
        "réflexion",
        "penser",
        "implémenter"
      ],
      conjunctions: ["and", "et", "avec", "with", "plus", "also", "également"],
      simpleMaxTokens: 10,
      moderateMaxTokens: 30
    },
    gate: {
      maxClarificationMarkers: 3,
      technologyTerms: [
        "database",
        "api",
        "endpoint",
        "schema",
        "sql",
        "query",
        "function",
        "class",
        "method",
        "algorithm",
        "framework",
        "microservice"
      ]
    },
    client: {
      endpoint: "http://localhost:8787/v1",
      apiKeyEnv: "SPECLOOP_API_KEY",
      effort: "medium",
      maxAttempts: 4,
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      timeoutMs: 300000,
      pollIntervalMs: 2000
    }
  };
}

export function configPath(workspaceRoot: string): string {
  const override = process.env.SPECLOOP_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(path.resolve(workspaceRoot), CONFIG_FILE_NAME);
}

export function mergeConfig(base: WorkflowConfig, input: ConfigFile): WorkflowConfig {
  const trigger = input.trigger ?? {};
  const gate = input.gate ?? {};
  const client = input.client ?? {};
  const merged: WorkflowConfig = {
    maxIterations: input.max_iterations ?? base.maxIterations,
    trigger: {
      vocabulary: trigger.vocabulary ?? base.trigger.vocabulary,
      conjunctions: trigger.conjunctions ?? base.trigger.conjunctions,
      simpleMaxTokens: trigger.simple_max_tokens ?? base.trigger.simpleMaxTokens,
      moderateMaxTokens: trigger.moderate_max_tokens ?? base.trigger.moderateMaxTokens
    },
    gate: {
      maxClarificationMarkers: gate.max_clarification_markers ?? base.gate.maxClarificationMarkers,
      technologyTerms: gate.technology_terms ?? base.gate.technologyTerms
    },
    client: {
      endpoint: client.endpoint?.trim() || base.client.endpoint,
      apiKeyEnv: client.api_key_env?.trim() || base.client.apiKeyEnv,
      effort: client.effort ?? base.client.effort,
      maxAttempts: client.max_attempts ?? base.client.maxAttempts,
      baseDelayMs: client.base_delay_ms ?? base.client.baseDelayMs,
      maxDelayMs: client.max_delay_ms ?? base.client.maxDelayMs,
      timeoutMs: client.timeout_ms ?? base.client.timeoutMs,
      pollIntervalMs: client.poll_interval_ms ?? base.client.pollIntervalMs
    }
  };
  if (merged.trigger.moderateMaxTokens < merged.trigger.simpleMaxTokens) {
    throw new ConfigError("trigger.moderate_max_tokens must not be lower than trigger.simple_max_tokens.");
  }
  if (merged.client.maxDelayMs < merged.client.baseDelayMs) {
    throw new ConfigError("client.max_delay_ms must not be lower than client.base_delay_ms.");
  }
  return merged;
}

function assertConfigFile(value: unknown, file: string): asserts value is ConfigFile {
  const validation = validateJson("workflow-config.schema.json", value);
  if (!validation.valid) {
    throw new ConfigError(`Invalid configuration in ${file}: ${validation.errors.join("; ")}`);
  }
}

export function parseConfig(raw: string, file = CONFIG_FILE_NAME): WorkflowConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}: ${describeError(error)}`, { cause: error });
  }
  if (parsed === undefined || parsed === null) {
    return defaultConfig();
  }
  assertConfigFile(parsed, file);
  return mergeConfig(defaultConfig(), parsed);
}

export function loadConfig(workspaceRoot: string): WorkflowConfig {
  const file = configPath(workspaceRoot);
  if (!fs.existsSync(file)) {
    return defaultConfig();
  }
  return parseConfig(fs.readFileSync(file, "utf-8"), file);
}
