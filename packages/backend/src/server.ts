import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { createRuntime } from "./runtime/container.js";
import { logger } from "./utils/logger.js";

const runtime = createRuntime();
const app = createApp(runtime);

const server = app.listen(appConfig.PORT, () => {
  logger.info(
    {
      provider: appConfig.LLM_PROVIDER,
      vectorIndex: appConfig.VECTOR_INDEX_PROVIDER,
      graph: runtime.entityGraph.size
    },
    `Medical triage service is running on http://localhost:${appConfig.PORT}`
  );
});

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Failed to release resources");
        process.exit(1);
      });
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
