/**
 * @file protocol/messages
 * @description JSON-RPC 2.0 envelope schema, response builders and the
 * error codes the router emits.
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod";

/** `null` is answered like any other id; only an absent id marks a notification. */
export type RequestId = string | number | null;

/** Session-level failure (unknown or released session); not part of JSON-RPC proper. */
export const SESSION_ERROR_CODE = ErrorCode.ConnectionClosed;

export const RPC_ERROR_CODES = {
  parseError: ErrorCode.ParseError,
  invalidRequest: ErrorCode.InvalidRequest,
  methodNotFound: ErrorCode.MethodNotFound,
  invalidParams: ErrorCode.InvalidParams,
  internalError: ErrorCode.InternalError,
} as const;

const requestIdSchema = z.union([z.string(), z.number().int(), z.null()]);

export const rpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: requestIdSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export type RpcEnvelope = z.infer<typeof rpcEnvelopeSchema>;

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RpcSuccess {
  jsonrpc: "2.0";
  id: RequestId;
  result: Record<string, unknown>;
}

export interface RpcFailure {
  jsonrpc: "2.0";
  id: RequestId;
  error: RpcErrorObject;
}

export type RpcResponse = RpcSuccess | RpcFailure;

export function rpcResult(id: RequestId, result: Record<string, unknown>): RpcSuccess {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(
  id: RequestId,
  code: number,
  message: string,
  data?: unknown,
): RpcFailure {
  return {
    jsonrpc: "2.0",
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

/** Thrown inside method handlers; the router turns it into an error response. */
export class RpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = "RpcError";
  }
}

/** Notifications never get a response: no id, or a `notifications/` method. */
export function isNotification(envelope: RpcEnvelope): boolean {
  return envelope.id === undefined || envelope.method.startsWith("notifications/");
}

/** Best-effort id recovery from a message that failed envelope validation. */
export function salvageId(message: unknown): RequestId {
  if (typeof message !== "object" || message === null || !("id" in message)) {
    return null;
  }
  const parsed = requestIdSchema.safeParse(message.id);
  return parsed.success ? parsed.data : null;
}
