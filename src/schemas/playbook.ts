import { z } from "zod";
import { ExecutionMode } from "./common.js";

export const ParameterType = z.enum(["string", "integer", "float", "boolean", "enum", "path"]);
export type ParameterType = z.infer<typeof ParameterType>;

const TYPE_ALIASES: Record<string, ParameterType> = {
  str: "string",
  int: "integer",
  number: "float",
  bool: "boolean"
};

const ScalarDefault = z.union([z.string(), z.number(), z.boolean()]);

export const ParameterDefinition = z
  .object({
    type: z.preprocess(
      (v) => (typeof v === "string" ? (TYPE_ALIASES[v] ?? v) : v),
      ParameterType
    ),
    required: z.boolean().default(false),
    default: ScalarDefault.nullable().optional(),
    description: z.string().default(""),
    enum_values: z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String)).min(1).optional()
  })
  .superRefine((def, ctx) => {
    if (def.type === "enum" && !def.enum_values) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["enum_values"],
        message: "enum parameters need a non-empty enum_values list"
      });
    }
  });
export type ParameterDefinition = z.infer<typeof ParameterDefinition>;

const StringList = z.array(z.union([z.string(), z.number()]).transform(String));

export const PlaybookFrontMatter = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  version: z.union([z.string().min(1), z.number()]).transform(String),
  description: z.string().default(""),
  parameters: z.record(z.string(), ParameterDefinition),
  allowed_tools: StringList,
  write_scope: StringList,
  run_mode: ExecutionMode.default("plan")
});
export type PlaybookFrontMatter = z.infer<typeof PlaybookFrontMatter>;

export const REQUIRED_FRONT_MATTER_KEYS = [
  "id",
  "version",
  "parameters",
  "allowed_tools",
  "write_scope"
] as const;

export const KNOWN_FRONT_MATTER_KEYS: ReadonlySet<string> = new Set([
  ...REQUIRED_FRONT_MATTER_KEYS,
  "description",
  "run_mode"
]);
