import { z } from 'zod';

const milliseconds = z.number().int().nonnegative();

/** Options every client accepts, checked before construction. */
export const clientConfigSchema = z.object({
  baseUrl: z.string().url(),
  headers: z.record(z.string()).optional(),
  connectTimeout: milliseconds.optional(),
  readTimeout: milliseconds.optional(),
  /** URL or bare `host:port` */
  proxy: z.string().min(1).optional(),
  verifySSL: z.boolean().optional(),
  userAgent: z.string().min(1).optional(),
});

/** Key-scheme options; an empty key or secret is allowed, as signing permits it. */
export const keyClientConfigSchema = clientConfigSchema.extend({
  apiKey: z.string(),
  apiSecret: z.string(),
});

export const tokenClientConfigSchema = clientConfigSchema.extend({
  token: z.string(),
  headerName: z.string().min(1).optional(),
  format: z.string().includes('{}').optional(),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;
