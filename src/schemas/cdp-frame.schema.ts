import { z } from 'zod';

export const ResponseFrameSchema = z.object({
  id: z.number().int().nonnegative(),
  result: z.record(z.unknown()).optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.string().optional(),
    })
    .optional(),
  sessionId: z.string().optional(),
});

export const EventFrameSchema = z.object({
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
  sessionId: z.string().optional(),
});

export const TargetInfoSchema = z
  .object({
    targetId: z.string(),
    type: z.string(),
    title: z.string().default(''),
    url: z.string().default(''),
    attached: z.boolean().optional(),
  })
  .passthrough();

export const TargetInfosResultSchema = z.object({
  targetInfos: z.array(TargetInfoSchema),
});

/** Body of the HTTP `/json/version` discovery endpoint. */
export const VersionInfoSchema = z
  .object({
    webSocketDebuggerUrl: z.string().optional(),
    Browser: z.string().optional(),
  })
  .passthrough();
