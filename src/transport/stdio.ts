/**
 * @file transport/stdio
 * @description Runs the protocol router over newline-delimited JSON-RPC on
 * stdin/stdout, using the SDK's stdio transport for framing.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ProtocolRouter } from "../protocol/router.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

/** Stdio carries exactly one client, reported under this session id. */
export const STDIO_SESSION_ID = "stdio";

export async function startStdioTransport(
  router: ProtocolRouter,
  transport: StdioServerTransport = new StdioServerTransport(),
): Promise<StdioServerTransport> {
  transport.onmessage = (message) => {
    router
      .handle(message, STDIO_SESSION_ID)
      .then(async (response) => {
        if (!response) return;
        const outgoing = JSONRPCMessageSchema.safeParse(response);
        if (!outgoing.success) {
          logger.warn("[Stdio] Dropping response the SDK cannot frame", { response });
          return;
        }
        await transport.send(outgoing.data);
      })
      .catch((error: unknown) => {
        logger.error("[Stdio] Failed to handle message", { cause: errorMessage(error) });
      });
  };
  transport.onerror = (error) => {
    logger.error("[Stdio] Transport error", error);
  };
  transport.onclose = () => {
    logger.info("[Stdio] Transport closed");
  };

  await transport.start();
  return transport;
}
