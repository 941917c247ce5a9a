import os from "node:os";
import path from "node:path";
import debug from "debug";
import { ValidationError, errorMessage } from "../core/errors.js";
import { readOptionalYamlFile } from "../store/yaml.js";
import type { RunLlmSnapshot } from "../schemas/run.js";
import {
  LLM_KEYS,
  LlmProvider,
  PROVIDER_DEFAULT_API_KEY,
  Settings,
  SettingsLayer,
  type LlmKey,
  type LlmSettings
} from "../schemas/settings.js";

const log = debug("puk:config");

export const WORKSPACE_CONFIG_FILENAME = ".puk.yaml";

export type SettingsSource = "default" | "global" | "workspace" | "override";

export type ResolvedSettings = {
  settings: Settings;
  sources: Record<LlmKey, SettingsSource>;
  files: { global: string | null; workspace: string };
};

export type ResolveSettingsArgs = {
  workspace_dir: string;
  overrides?: SettingsLayer;
  // null disables the global layer entirely (tests, sandboxes).
  global_config_path?: string | null;
};

const ENV_NAME = /^[A-Z_][A-Z0-9_]*$/;

export function defaultSettings(): Settings {
  return {
    llm: {
      provider: "copilot",
      model: "",
      api_key: "OPENAI_API_KEY",
      azure_endpoint: "",
      azure_api_version: "2024-02-15-preview",
      max_output_tokens: 2048,
      temperature: 0.2
    },
    agent: { command: [] },
    runs: { stale_after_seconds: 900 },
    session: { tools: null }
  };
}

export function globalConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string | null {
  if (platform === "win32") {
    return env.APPDATA ? path.join(env.APPDATA, "puk", "config.yaml") : null;
  }
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", "puk", "config.yaml");
  }
  const base = env.XDG_CONFIG_HOME || path.join(home, ".config");
  return path.join(base, "puk", "config.yaml");
}

async function loadLayer(filePath: string): Promise<SettingsLayer> {
  let raw: unknown;
  try {
    raw = await readOptionalYamlFile(filePath);
  } catch (e) {
    throw new ValidationError("invalid_settings", `Config file ${filePath} is not valid YAML: ${errorMessage(e)}`, {
      cause: e
    });
  }
  if (raw === undefined || raw === null) return {};
  const parsed = SettingsLayer.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError("invalid_settings", `Invalid config file ${filePath}: ${detail}`);
  }
  return parsed.data;
}

export async function resolveSettings(args: ResolveSettingsArgs): Promise<ResolvedSettings> {
  const defaults = defaultSettings();
  const llm: Record<string, unknown> = { ...defaults.llm };
  const sources: Record<LlmKey, SettingsSource> = {
    provider: "default",
    model: "default",
    api_key: "default",
    azure_endpoint: "default",
    azure_api_version: "default",
    max_output_tokens: "default",
    temperature: "default"
  };
  let agentCommand = defaults.agent.command;
  let staleAfter = defaults.runs.stale_after_seconds;
  let sessionTools = defaults.session.tools;

  const globalPath = args.global_config_path === undefined ? globalConfigPath() : args.global_config_path;
  const workspacePath = path.join(args.workspace_dir, WORKSPACE_CONFIG_FILENAME);

  const layers: Array<{ source: SettingsSource; layer: SettingsLayer }> = [];
  if (globalPath) layers.push({ source: "global", layer: await loadLayer(globalPath) });
  layers.push({ source: "workspace", layer: await loadLayer(workspacePath) });
  if (args.overrides) layers.push({ source: "override", layer: args.overrides });

  for (const { source, layer } of layers) {
    for (const key of LLM_KEYS) {
      const value = layer.llm?.[key];
      if (value === undefined) continue;
      llm[key] = value;
      sources[key] = source;
    }
    if (layer.agent?.command !== undefined) agentCommand = layer.agent.command;
    if (layer.runs?.stale_after_seconds !== undefined) staleAfter = layer.runs.stale_after_seconds;
    if (layer.session?.tools !== undefined) sessionTools = layer.session.tools;
  }

  const provider = LlmProvider.safeParse(llm.provider);
  const providerKey = provider.success ? PROVIDER_DEFAULT_API_KEY[provider.data] : undefined;
  if (providerKey && sources.api_key === "default") llm.api_key = providerKey;

  const parsed = Settings.safeParse({
    llm,
    agent: { command: agentCommand },
    runs: { stale_after_seconds: staleAfter },
    session: { tools: sessionTools }
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError("invalid_settings", `Invalid LLM settings: ${detail}`);
  }

  const resolved: ResolvedSettings = {
    settings: parsed.data,
    sources,
    files: { global: globalPath, workspace: workspacePath }
  };
  for (const line of describeSettings(resolved)) log(line);
  return resolved;
}

export function describeSettings(resolved: ResolvedSettings): string[] {
  const s = resolved.settings.llm;
  return LLM_KEYS.map((key) => {
    let value = String(s[key]);
    if (key === "api_key" && !ENV_NAME.test(value)) value = "<redacted>";
    return `llm.${key}=${value || "<unset>"} (source=${resolved.sources[key]})`;
  });
}

export function llmSnapshot(llm: LlmSettings): RunLlmSnapshot {
  return {
    provider: llm.provider,
    model: llm.model,
    temperature: llm.temperature,
    max_output_tokens: llm.max_output_tokens
  };
}
