// backend/services/item/src/index.ts
import "./bootstrap";
import { getLogger, initLogger } from "@restset/shared";
import { createApp } from "./app";
import { config } from "./config";
import { CatRepo } from "./repo/catRepo";
import { ItemRepo } from "./repo/itemRepo";

initLogger({ service: config.serviceName, level: config.logLevel });
const log = getLogger({ component: "item.index" });

const items = new ItemRepo({
  seed: [
    { id: 1, name: "first", dateCreated: new Date() },
    { id: 2, name: "second", dateCreated: new Date() },
  ],
});
const cats = new CatRepo([
  { id: 1, name: "Tom" },
  { id: 2, name: "Garfield" },
]);

const app = createApp({ serviceName: config.serviceName, items, cats });

const server = app.listen(config.port, () => {
  log.info({ port: config.port }, `${config.serviceName} listening`);
});

const shutdown = (signal: string) => {
  log.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) {
      log.error({ err: log.serializeError(err) }, "close failed");
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
