import { z } from 'zod';

const RUNTIME_ALIASES: Record<string, string> = {
  'chrome-js': 'chrome-script',
  python: 'process',
  node: 'process',
};

export const RecipeRuntimeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (RUNTIME_ALIASES[value] ?? value) : value),
  z.enum(['chrome-script', 'process', 'shell']),
);

export const InputDeclarationSchema = z
  .object({
    type: z.string().min(1),
    required: z.boolean(),
    default: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const EnvDeclarationSchema = z
  .object({
    required: z.boolean().default(false),
    default: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

/**
 * Front-matter block of a recipe metadata document. Unknown keys are dropped
 * so newer documents still load.
 */
export const RecipeFrontMatterSchema = z
  .object({
    name: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'name must only contain letters, numbers, underscores and hyphens'),
    type: z.enum(['atomic', 'workflow']),
    runtime: RecipeRuntimeSchema,
    version: z.string().regex(/^\d+\.\d+(\.\d+)?$/, "version must look like '1.0' or '1.0.0'"),
    description: z.string().max(200).default(''),
    inputs: z.record(InputDeclarationSchema).nullish().transform((v) => v ?? {}),
    outputs: z
      .record(z.coerce.string())
      .nullish()
      .transform((v) => v ?? {}),
    dependencies: z.array(z.string().min(1)).nullish().transform((v) => v ?? []),
    tags: z.array(z.coerce.string()).nullish().transform((v) => v ?? []),
    env: z
      .record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'invalid environment variable name'), EnvDeclarationSchema)
      .nullish()
      .transform((v) => v ?? {}),
  })
  .superRefine((data, ctx) => {
    if (data.type === 'atomic' && data.dependencies.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dependencies'],
        message: 'atomic recipes cannot declare dependencies',
      });
    }
    if (data.type === 'workflow' && data.runtime !== 'process') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['runtime'],
        message: 'workflow recipes must use the process runtime',
      });
    }
  });

export type RecipeFrontMatter = z.output<typeof RecipeFrontMatterSchema>;
