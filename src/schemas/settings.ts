import { z } from "zod";

export const SUPPORTED_PROVIDERS = ["copilot", "openai", "azure", "anthropic"] as const;
export const LlmProvider = z.enum(SUPPORTED_PROVIDERS);
export type LlmProvider = z.infer<typeof LlmProvider>;

export const PROVIDER_DEFAULT_API_KEY: Partial<Record<LlmProvider, string>> = {
  openai: "OPENAI_API_KEY",
  azure: "AZURE_OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY"
};

export const LLM_KEYS = [
  "provider",
  "model",
  "api_key",
  "azure_endpoint",
  "azure_api_version",
  "max_output_tokens",
  "temperature"
] as const;
export type LlmKey = (typeof LLM_KEYS)[number];

export const LlmSettings = z
  .object({
    provider: LlmProvider,
    model: z.string(),
    api_key: z.string(),
    azure_endpoint: z.string(),
    azure_api_version: z.string(),
    max_output_tokens: z.number().int().positive(),
    temperature: z.number().finite().min(0).max(2)
  })
  .superRefine((s, ctx) => {
    if ((s.provider === "openai" || s.provider === "anthropic") && !s.model) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["model"],
        message: `provider '${s.provider}' requires an explicit non-empty model`
      });
    }
    if (s.provider === "azure" && !s.azure_endpoint) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["azure_endpoint"],
        message: "provider 'azure' requires a non-empty azure_endpoint"
      });
    }
    if (s.provider !== "copilot" && !s.api_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["api_key"],
        message: `provider '${s.provider}' requires a non-empty api_key`
      });
    }
  });
export type LlmSettings = z.infer<typeof LlmSettings>;

export const Settings = z.object({
  llm: LlmSettings,
  agent: z.object({
    command: z.array(z.string().min(1))
  }),
  runs: z.object({
    stale_after_seconds: z.number().int().positive()
  }),
  session: z.object({
    tools: z.array(z.string().min(1)).nullable()
  })
});
export type Settings = z.infer<typeof Settings>;

// One config file layer: every key optional, unknown keys rejected so typos surface.
export const SettingsLayer = z
  .object({
    llm: z
      .object({
        provider: LlmProvider.optional(),
        model: z.string().optional(),
        api_key: z.string().optional(),
        azure_endpoint: z.string().optional(),
        azure_api_version: z.string().optional(),
        max_output_tokens: z.number().int().positive().optional(),
        temperature: z.number().finite().optional()
      })
      .strict()
      .optional(),
    agent: z
      .object({ command: z.array(z.string().min(1)).optional() })
      .strict()
      .optional(),
    runs: z
      .object({ stale_after_seconds: z.number().int().positive().optional() })
      .strict()
      .optional(),
    session: z
      .object({ tools: z.array(z.string().min(1)).nullable().optional() })
      .strict()
      .optional()
  })
  .strict();
export type SettingsLayer = z.infer<typeof SettingsLayer>;
