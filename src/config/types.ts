import { z } from 'zod';

export const BuildConfigSchema = z
  .object({
    build: z
      .object({
        release: z.boolean().default(true),
        features: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    output: z
      .object({
        directory: z.string().min(1).default('target'),
      })
      .strict()
      .default({}),
  })
  .strict();

/** Per-project settings read from screeps.yaml. */
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
