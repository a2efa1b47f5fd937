import { RelayError } from 'agentlink-protocol';
import WebSocket from 'ws';

/**
 * Open a WebSocket and resolve once it is open. Any failure before that,
 * including running past `timeoutMs`, rejects with `TRANSPORT_FAILED`.
 */
export function openSocket(url: string, timeoutMs: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    let ws: WebSocket;
    try {
      ws = new WebSocket(url);
    } catch (err) {
      reject(new RelayError('TRANSPORT_FAILED', `Cannot connect to ${url}: ${describeError(err)}`, { url }));
      return;
    }

    let settled = false;
    const fail = (message: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new RelayError('TRANSPORT_FAILED', message, { url }));
    };

    const timer = setTimeout(() => {
      fail(`Timed out connecting to ${url} after ${timeoutMs}ms`);
      ws.terminate();
    }, timeoutMs);

    const onError = (err: Error): void => fail(`Cannot connect to ${url}: ${err.message}`);
    const onClose = (code: number): void => fail(`Connection to ${url} closed during handshake (${code})`);

    ws.on('error', onError);
    ws.once('close', onClose);
    ws.once('open', () => {
      settled = true;
      clearTimeout(timer);
      ws.off('error', onError);
      ws.off('close', onClose);
      resolve(ws);
    });
  });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Send when the socket is open. Returns false when the frame could not be sent. */
export function sendIfOpen(ws: WebSocket | null, frame: string): boolean {
  if (!ws || ws.readyState !== WebSocket.OPEN) return false;
  ws.send(frame);
  return true;
}
