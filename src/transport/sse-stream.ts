/**
 * @file transport/sse-stream
 * @description Server-Sent Events framing and the minimal writable-stream
 * contract the session registry writes to. An Express `Response` satisfies
 * `EventStream`; tests use an in-memory stand-in.
 */

export interface EventStream {
  write(chunk: string, callback?: (error?: Error | null) => void): boolean;
  end(): unknown;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

export const SSE_HEADERS: Record<string, string> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

export const KEEPALIVE_FRAME = ": keepalive\n\n";

/** One `event:` frame; multi-line data is split across `data:` lines. */
export function formatSseEvent(event: string, data: string): string {
  const dataLines = data
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join("\n");
  return `event: ${event}\n${dataLines}\n\n`;
}

export function isWritable(stream: EventStream): boolean {
  return !stream.writableEnded && !stream.destroyed;
}
