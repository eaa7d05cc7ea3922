import { z } from 'zod';

export const ConnectionConfigSchema = z
  .object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(9222),
    connectTimeoutMs: z.number().positive().default(5000),
    commandTimeoutMs: z.number().positive().default(30_000),
    maxRetries: z.number().int().min(0).default(3),
    retryDelayMs: z.number().min(0).default(1000),
    proxy: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(1).max(65535).optional(),
        username: z.string().optional(),
        password: z.string().optional(),
      })
      .optional(),
    noProxy: z.boolean().default(false),
    targetId: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
  })
  .superRefine((config, ctx) => {
    const proxy = config.proxy;
    if (!proxy) return;
    if (proxy.host && proxy.port === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxy', 'port'],
        message: 'proxy host requires a proxy port',
      });
    }
    if (proxy.port !== undefined && !proxy.host) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxy', 'host'],
        message: 'proxy port requires a proxy host',
      });
    }
    if (Boolean(proxy.username) !== Boolean(proxy.password)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxy'],
        message: 'proxy username and password must be given together',
      });
    }
  });

export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;
