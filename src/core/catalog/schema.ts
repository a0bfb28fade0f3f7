import { z } from "zod";
import { VALUE_TYPES } from "../types/valueType";

export const TARGET_IDS = ["mcc-cea", "xbox", "gbx-retail", "gbx-demo", "gbx-custom"] as const;

export const TargetIdSchema = z.enum(TARGET_IDS);
export const ValueTypeSchema = z.enum(VALUE_TYPES);

export const FormKindSchema = z.enum(["sequence", "random", "conditional", "cond", "logical", "assignment"]);

export const LimitsSchema = z
  .object({
    maxScripts: z.number().int().positive(),
    maxGlobals: z.number().int().positive(),
    maxScriptParameters: z.number().int().nonnegative(),
    maxNameLength: z.number().int().positive(),
    maxNodes: z.number().int().positive(),
  })
  .strict();

export const EngineSchema = z
  .object({
    id: TargetIdSchema,
    name: z.string().min(1),
    limits: LimitsSchema,
  })
  .strict();

export const ParameterSchema = z
  .object({
    type: ValueTypeSchema,
    many: z.boolean().default(false),
    optional: z.boolean().default(false),
    allowUppercase: z.boolean().default(false),
  })
  .strict();

export const FunctionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    type: ValueTypeSchema,
    form: FormKindSchema.optional(),
    parameters: z.array(ParameterSchema).default([]),
    numberPassthrough: z.boolean().default(false),
    inequality: z.boolean().default(false),
    passthroughLast: z.boolean().default(false),
    engines: z.array(TargetIdSchema).min(1),
  })
  .strict();

export const GlobalSchema = z
  .object({
    name: z.string().min(1),
    type: ValueTypeSchema,
    engines: z.array(TargetIdSchema).min(1),
  })
  .strict();

export const ConversionSchema = z
  .object({
    from: ValueTypeSchema,
    to: ValueTypeSchema,
    kind: z.enum(["widening", "narrowing", "upcast"]),
  })
  .strict();

export const DefinitionsSchema = z
  .object({
    description: z.string().default(""),
    engines: z.array(EngineSchema).min(1),
    conversions: z.array(ConversionSchema).default([]),
    functions: z.array(FunctionSchema),
    globals: z.array(GlobalSchema).default([]),
  })
  .strict();

export type TargetId = z.infer<typeof TargetIdSchema>;
export type FormKind = z.infer<typeof FormKindSchema>;
export type Limits = z.infer<typeof LimitsSchema>;
export type EngineDef = z.infer<typeof EngineSchema>;
export type ParameterDef = z.infer<typeof ParameterSchema>;
export type FunctionDef = z.infer<typeof FunctionSchema>;
export type GlobalDef = z.infer<typeof GlobalSchema>;
export type ConversionDef = z.infer<typeof ConversionSchema>;
export type Definitions = z.infer<typeof DefinitionsSchema>;

/** Definition data as written in JSON, before defaults are applied. */
export type DefinitionsInput = z.input<typeof DefinitionsSchema>;

const TARGET_ID_SET: ReadonlySet<string> = new Set<string>(TARGET_IDS);

export function isTargetId(value: string): value is TargetId {
  return TARGET_ID_SET.has(value);
}
