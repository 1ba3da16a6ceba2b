/**
 * Network probe for local endpoints.
 */

import { Socket } from 'node:net';

export interface NetworkProbe {
  /** True if a TCP connection opens within the timeout */
  tcpConnect(host: string, port: number, timeoutMs: number): Promise<boolean>;
  /** HTTP status code, or null when no response arrived within the timeout */
  httpGet(url: string, timeoutMs: number): Promise<number | null>;
}

export const nodeNetworkProbe: NetworkProbe = {
  tcpConnect(host, port, timeoutMs) {
    return new Promise<boolean>((resolve) => {
      const socket = new Socket();
      const finish = (connected: boolean) => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(connected);
      };
      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
      socket.connect(port, host);
    });
  },

  async httpGet(url, timeoutMs) {
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      await response.body?.cancel();
      return response.status;
    } catch {
      return null;
    }
  },
};
