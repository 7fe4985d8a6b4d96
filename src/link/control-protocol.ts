import { z } from "zod";

export const ControlRequestFrameSchema = z.object({
  type: z.literal("req"),
  id: z.string().min(1),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export type ControlRequestFrame = z.infer<typeof ControlRequestFrameSchema>;

export const ControlResponseFrameSchema = z.object({
  type: z.literal("res"),
  id: z.string(),
  ok: z.boolean(),
  payload: z.unknown().optional(),
  error: z.object({ code: z.string(), message: z.string() }).nullish(),
});

export type ControlResponseFrame = z.infer<typeof ControlResponseFrameSchema>;
