import { z } from 'zod';

export const environmentConfigSchema = z
  .object({
    urls: z.array(z.string().min(1)),
    active_url_idx: z.number().int().nonnegative().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.active_url_idx !== undefined && env.active_url_idx >= env.urls.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `active_url_idx ${env.active_url_idx} is out of range for ${env.urls.length} url(s)`,
        path: ['active_url_idx'],
      });
    }
  })
  .transform((env) => ({
    urls: env.urls,
    active_url_idx: env.active_url_idx ?? (env.urls.length > 0 ? 0 : null),
  }));

export const siteConfigSchema = z.object({
  environments: z.record(environmentConfigSchema),
});

export type EnvironmentConfig = z.infer<typeof environmentConfigSchema>;
export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type SiteConfigInput = z.input<typeof siteConfigSchema>;
