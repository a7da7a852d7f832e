import { z } from 'zod';

export const compileOptionsSchema = z.object({
  separator: z.string().min(1, 'separator must not be empty').default('.'),
  sourceName: z.string().optional(),
});

export const planOptionsSchema = z.object({
  strategy: z.enum(['eager', 'deferred']).default('eager'),
});

export const unpackOptionsSchema = compileOptionsSchema.merge(planOptionsSchema);

export type CompileOptions = z.input<typeof compileOptionsSchema>;
export type ResolvedCompileOptions = z.output<typeof compileOptionsSchema>;

export type PlanOptions = z.input<typeof planOptionsSchema>;
export type ResolvedPlanOptions = z.output<typeof planOptionsSchema>;

export type UnpackOptions = z.input<typeof unpackOptionsSchema>;
