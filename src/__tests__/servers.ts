import http from "node:http";
import net from "node:net";

export async function listen(server: net.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address.port;
}

export function close(server: net.Server): Promise<void> {
  if (server instanceof http.Server) {
    server.closeAllConnections();
  }
  return new Promise((resolve) => server.close(() => resolve()));
}

/** Accepts TCP connections and hangs up right away. */
export function createPingServer(): net.Server {
  return net.createServer((socket) => socket.end());
}

/** Returns a local port that nothing listens on. */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

export const SMALL_FILE_SIZE = 1000;

/**
 * `/stream` sends 64 KiB chunks until the client goes away,
 * `/small` sends a fixed body, anything else is a 404.
 */
export function createDownloadServer(): http.Server {
  return http.createServer((req, res) => {
    if (req.url === "/stream") {
      res.writeHead(200, { "Content-Type": "application/octet-stream" });
      const chunk = Buffer.alloc(64 * 1024);
      const timer = setInterval(() => res.write(chunk), 5);
      res.on("close", () => clearInterval(timer));
      return;
    }
    if (req.url === "/small") {
      res.writeHead(200, { "Content-Type": "application/octet-stream" });
      res.end(Buffer.alloc(SMALL_FILE_SIZE));
      return;
    }
    res.writeHead(404);
    res.end("not found");
  });
}
