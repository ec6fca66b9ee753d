import { loadEnvFile, loadServerConfig } from "./server/config";
import { GameServer } from "./server/GameServer";

loadEnvFile();
const config = loadServerConfig();
const server = new GameServer(config);

async function shutdown(signal: string): Promise<void> {
  console.log(`[shutdown] ${signal} received, stopping server...`);
  try {
    await server.stop();
    process.exit(0);
  } catch (err) {
    console.error("[shutdown] Shutdown failed:", err);
    process.exit(1);
  }
}

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});
process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});

server.start().catch((err: unknown) => {
  console.error("[server] Failed to start:", err);
  process.exit(1);
});
