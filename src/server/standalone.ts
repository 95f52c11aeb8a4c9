import { createServer } from "node:http";
import { loadServerConfig } from "../config/serverEnv.js";
import { WebSocketServerTransport } from "../transport/WebSocketServerTransport.js";
import { GameServer } from "./GameServer.js";
import { closeServerLog, initServerLog, installCrashHandlers, serverLog } from "./serverLog.js";

const config = loadServerConfig();

initServerLog(config.dataDir);
installCrashHandlers();

const httpServer = createServer((req, res) => {
  const url = req.url ?? "/";
  if (url === "/health") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(`ok ${server.sessionCount} online, tick ${server.store.tick}\n`);
    return;
  }
  res.writeHead(404);
  res.end("Not Found");
});

const transport = new WebSocketServerTransport({
  server: httpServer,
  path: config.wsPath,
  maxPayloadBytes: config.maxPayloadBytes,
  maxBufferedBytes: config.maxBufferedBytes,
});

const server = new GameServer(transport, config);
server.start();
server.startLoop();

httpServer.listen(config.port, config.host, () => {
  serverLog(`Server listening on ws://${config.host}:${config.port}${config.wsPath ?? ""}`);
  serverLog(
    `tick ${config.tickMs}ms, world ${config.bounds.width}x${config.bounds.height}, ` +
      `max ${config.maxPlayers} players`,
  );
});

// Graceful shutdown
function shutdown(signal: string) {
  serverLog(`${signal} received, shutting down...`);
  server.destroy();
  httpServer.closeAllConnections();
  httpServer.close(() => {
    closeServerLog();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
