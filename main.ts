import { buildServer } from "./server";
import { config } from "./src/config";

async function start(): Promise<void> {
  const app = buildServer(config);
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`treemap-tint listening on http://${config.host}:${config.port}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
