import { loadServiceConfig } from "./config";
import { buildServer } from "./server";

const config = loadServiceConfig();
const app = buildServer(config);

app.listen({ port: config.server.port, host: config.server.host }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
