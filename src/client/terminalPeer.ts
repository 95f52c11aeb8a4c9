import { createInterface } from "node:readline";
import { DEFAULT_PORT } from "../config/constants.js";
import { WebSocketClientTransport } from "../transport/WebSocketClientTransport.js";
import { GameClient } from "./GameClient.js";

const SERVER_URL = process.env.SERVER_URL ?? `ws://localhost:${DEFAULT_PORT}`;

/**
 * Minimal interactive peer: prints chat and join/leave events, sends every
 * typed line as chat. "/move x y" and "/run on|off" send input instead.
 */
async function main(): Promise<void> {
  const transport = new WebSocketClientTransport(SERVER_URL);
  const client = new GameClient(transport);

  client.on("INIT", (msg) => {
    const online = Object.keys(msg.gameState.players).length;
    console.log(`joined as ${msg.playerId} (${online} online, tick ${msg.gameState.tick})`);
  });
  client.on("PLAYER_JOINED", (msg) => {
    console.log(`* ${msg.player.name} joined`);
  });
  client.on("PLAYER_LEFT", (msg) => {
    console.log(`* ${msg.playerId} left`);
  });
  client.on("CHAT_MESSAGE", ({ message }) => {
    console.log(`<${message.playerName}> ${message.content}`);
  });
  client.on("ERROR", (msg) => {
    console.log(`! ${msg.message}`);
  });
  await transport.ready();

  const rl = createInterface({ input: process.stdin });
  client.onClose(() => {
    const reason = transport.closeReason ? `: ${transport.closeReason}` : "";
    console.log(`disconnected${reason}`);
    rl.close();
  });

  rl.on("line", (line) => {
    try {
      handleLine(client, line.trim());
    } catch (err) {
      console.log(`! ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  rl.on("close", () => {
    client.close();
  });
}

function handleLine(client: GameClient, line: string): void {
  if (line === "") return;
  const [command, ...args] = line.split(/\s+/);
  switch (command) {
    case "/move": {
      const [x, y] = args.map(Number);
      if (x === undefined || y === undefined) throw new Error("usage: /move x y");
      client.move({ x, y });
      return;
    }
    case "/run":
      client.setRunning(args[0] !== "off");
      return;
    case "/where": {
      const self = client.self;
      console.log(self ? `at (${self.position.x}, ${self.position.y})` : "not joined");
      return;
    }
    default:
      client.chat(line);
  }
}

main().catch((err: unknown) => {
  console.error("[gridsync] client failed:", err);
  process.exit(1);
});
