import { z } from "zod";
import { DeviceLinkError, describeError } from "../../infra/errors.js";

export type RpcError = { code: string; message: string };

export type RespondFn = (ok: boolean, payload?: unknown, error?: RpcError) => void;

export type HandlerFn = (opts: {
  params: Record<string, unknown>;
  respond: RespondFn;
}) => void | Promise<void>;

export type ControlRequestHandlers = Record<string, HandlerFn>;

export const DeviceParamsSchema = z.object({ deviceId: z.string().min(1) }).strict();

export const PairingRespondParamsSchema = z
  .object({ deviceId: z.string().min(1), accept: z.boolean() })
  .strict();

export const PluginSetParamsSchema = z
  .object({ deviceId: z.string().min(1), pluginId: z.string().min(1), enabled: z.boolean() })
  .strict();

/** Validate params; on failure responds INVALID_PARAMS and returns null. */
export function parseParams<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>,
  respond: RespondFn,
): T | null {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    respond(false, undefined, { code: "INVALID_PARAMS", message: `${where}${issue?.message ?? "invalid params"}` });
    return null;
  }
  return parsed.data;
}

export function toRpcError(err: unknown): RpcError {
  if (err instanceof DeviceLinkError) {
    return { code: err.code, message: err.message };
  }
  return { code: "INTERNAL", message: describeError(err) };
}

export function respondWithError(respond: RespondFn, err: unknown): void {
  respond(false, undefined, toRpcError(err));
}
