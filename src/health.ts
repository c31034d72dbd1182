/**
 * Liveness endpoint for hosting platforms that expect a web port.
 * Every request gets 200 "Bot is running".
 */

import http from "node:http";

export const HEALTH_RESPONSE = "Bot is running";

export interface HealthServer {
  /** Resolves with the bound port once listening. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export function createHealthServer(port: number, host = "0.0.0.0"): HealthServer {
  const server = http.createServer((_req, res) => {
    res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
    res.end(HEALTH_RESPONSE);
  });

  return {
    start() {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
          server.off("error", reject);
          const address = server.address();
          const bound = address && typeof address === "object" ? address.port : port;
          console.log(`[health] Listening on ${host}:${bound}`);
          resolve(bound);
        });
      });
    },

    stop() {
      return new Promise((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
