import { createServer } from "node:http";

import { getRequestListener } from "@hono/node-server";

import { getChatRuntime } from "@/config/realtime-server";
import { serverEnv } from "@/lib/env/server";
import { createHttpApp } from "@/server/http/app";
import {
  flushErrorReporting,
  initErrorReporting,
  reportUnexpectedError,
} from "@/server/observability/sentry";

initErrorReporting();

const runtime = getChatRuntime();
const app = createHttpApp(runtime);
const server = createServer(getRequestListener(app.fetch));

server.on("upgrade", (request, socket, head) => {
  if (!runtime.gateway.handleUpgrade(request, socket, head)) {
    socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
    socket.destroy();
  }
});

server.listen(serverEnv.PORT, () => {
  console.info("chat.server.listening", { port: serverEnv.PORT });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.info("chat.server.shutdown", { signal });
  try {
    await runtime.dispose();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  } catch (error) {
    reportUnexpectedError("chat.server.shutdown_failed", error, { signal });
    process.exitCode = 1;
  } finally {
    await flushErrorReporting();
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("unhandledRejection", (reason) => {
  reportUnexpectedError("chat.server.unhandled_rejection", reason);
});
