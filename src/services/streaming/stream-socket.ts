/**
 * Transport seam for the streaming client. Production sockets come from
 * `ws`; tests pass a factory returning an in-memory socket.
 */

import WebSocket from "ws";

export interface StreamSocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface StreamSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  /** Drop the connection without a close handshake */
  terminate(): void;
}

export type StreamSocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: StreamSocketHandlers,
) => StreamSocket;

function rawToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export const createWsSocket: StreamSocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers });

  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data: WebSocket.RawData) => handlers.onMessage(rawToText(data)));
  ws.on("close", (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
  ws.on("error", (err: Error) => handlers.onError(err));

  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
  };
};
