import type { WebSocket as UndiciWebSocket } from 'undici';
import { clientLogger } from './logger';

/**
 * Load the WebSocket implementation. Node 20 has no stable global
 * WebSocket, so it comes from undici.
 */
export async function resolveWS(): Promise<typeof UndiciWebSocket> {
  try {
    const { WebSocket } = await import('undici');
    return WebSocket;
  } catch (err) {
    clientLogger('error', 'Could not load a WebSocket implementation from undici');
    throw err;
  }
}
