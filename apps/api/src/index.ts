import "dotenv/config";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = await createServer(config);

  await server.listen({ port: config.PORT, host: config.HOST });
  server.log.info(`Market API running on ${config.HOST}:${config.PORT}`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
