import { readFile } from "node:fs/promises";
import YAML from "yaml";
import type { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import {
  FixtureFileSchema,
  ReleaseGateConfigSchema,
  type ReleaseGateConfig,
  type SampleConfig
} from "./schema.js";

export async function loadConfig(path: string): Promise<ReleaseGateConfig> {
  const raw = await readFile(path, "utf8");
  return parseConfig(YAML.parse(raw));
}

export function parseConfig(input: unknown): ReleaseGateConfig {
  const result = ReleaseGateConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid releasegate config:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadFixtureFile(path: string): Promise<SampleConfig[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot read fixtures ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = FixtureFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid fixtures file ${path}:\n${formatIssues(result.error)}`);
  }
  return result.data.samples;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `  ${pointer}: ${issue.message}`;
    })
    .join("\n");
}
