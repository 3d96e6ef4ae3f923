/**
 * Minimal Server-Sent Events helper for Express responses.
 *
 * Frames are `event: <name>\ndata: <json>\n\n`. Writes after the client has
 * gone away are dropped.
 */
export interface SseResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: "close", listener: () => void): unknown;
  readonly writableEnded: boolean;
}

export interface SseChannel {
  send(event: string, data: unknown): void;
  close(): void;
}

export const SSE_HEADERS: Record<string, string> = {
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-store, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no", // for some proxies
};

export function sseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/** Aborts once the connection closes before the response was ended. */
export function abortOnDisconnect(res: SseResponse): AbortSignal {
  const controller = new AbortController();

  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort(new Error("client disconnected"));
    }
  });

  return controller.signal;
}

export function openSse(res: SseResponse): SseChannel {
  res.writeHead(200, SSE_HEADERS);

  return {
    send(event: string, data: unknown): void {
      if (!res.writableEnded) {
        res.write(sseFrame(event, data));
      }
    },
    close(): void {
      if (!res.writableEnded) {
        res.end();
      }
    },
  };
}
