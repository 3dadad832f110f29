import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

/**
 * Environment variables holding credentials. They never live in the YAML file.
 */
export type SecretEnv = Readonly<Record<string, string | undefined>>;

function readSecret(env: SecretEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function loadConfig(
  configPath: string,
  env: SecretEnv = process.env,
): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`invalid configuration in ${configPath}: expected a mapping`);
  }

  const result = appConfigSchema.safeParse({
    ...parsed,
    secrets: {
      telegramBotToken: readSecret(env, "TELEGRAM_BOT_TOKEN"),
      telegraphAccessToken: readSecret(env, "TELEGRAPH_ACCESS_TOKEN"),
      llmApiKey: readSecret(env, "LLM_API_KEY"),
    },
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export type { AppConfig };
export type { ChatId, LlmProvider, ModerationLabels } from "./schema";
