import { z } from "zod";

export const DelegationPayloadSchema = z.object({
  taskId: z.string(),
  description: z.unknown(),
  capability: z.string(),
  priority: z.number().int(),
  attempt: z.number().int().positive(),
  inputs: z.record(z.unknown()).default({})
});

export type DelegationPayload = z.infer<typeof DelegationPayloadSchema>;

export const TaskReplySchema = z.union([
  z.object({
    ok: z.literal(true),
    result: z.unknown(),
    attempt: z.number().int().positive().optional()
  }),
  z.object({
    ok: z.literal(false),
    error: z.string().min(1),
    attempt: z.number().int().positive().optional()
  }),
  z
    .object({
      progress: z.unknown(),
      attempt: z.number().int().positive().optional()
    })
    .strict()
    .refine((value) => value.progress !== undefined, { message: "progress is required" })
]);

export type TaskReply = z.infer<typeof TaskReplySchema>;

export const CancelPayloadSchema = z.object({
  action: z.literal("cancel"),
  taskId: z.string(),
  reason: z.string()
});

export type CancelPayload = z.infer<typeof CancelPayloadSchema>;

export const TaskQuerySchema = z.object({
  taskId: z.string()
});
