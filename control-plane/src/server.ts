import {
  PolkitPrivilegeEscalator,
  PrivilegedExecutionEngine,
  ProcessExecutionEngine,
  type ExecutionEngine,
} from "@atomic-image-manager/executor";
import { createImageManagerApp } from "./app.js";
import { RpmOstreeStatusSource } from "./adapters/rpm-ostree-status-source.js";
import { SkopeoTagSource } from "./adapters/skopeo-tag-source.js";
import { loadConfig, type ImageManagerConfig } from "./config.js";
import { createLogger, type Logger } from "./observability/logger.js";
import { FileHistoryLedger } from "./repositories/file-history-ledger.js";
import { ImageCatalog } from "./services/image-catalog.js";
import { createScheduler } from "./services/scheduler.js";

const config = await loadConfig();
const logger = createLogger(
  { component: "image-manager" },
  { level: config.logLevel },
);

const catalog = await ImageCatalog.load(config.catalogFile);
const ledger = new FileHistoryLedger({
  dataDir: config.dataDir,
  logger,
});

const { app } = createImageManagerApp({
  engine: createEngine(config, logger),
  statusSource: new RpmOstreeStatusSource({
    launcher: config.launcher,
    timeoutMs: config.statusTimeoutMs,
    logger,
  }),
  ledger,
  catalog,
  tagSource: new SkopeoTagSource({ launcher: config.launcher, logger }),
  allowlist: config.registryAllowlist,
  scheduler: createScheduler(config.scheduler),
  logger,
});

app.listen(config.port, config.host, () => {
  logger.info("listening", {
    host: config.host,
    port: config.port,
    historyFile: ledger.filePath,
    privilege: config.privilege,
  });
});

function createEngine(config: ImageManagerConfig, logger: Logger): ExecutionEngine {
  const engineLogger = logger.child({ component: "executor" });
  const engine = new ProcessExecutionEngine({
    launcher: config.launcher,
    allowlist: config.registryAllowlist,
    logger: engineLogger,
  });
  if (config.privilege === "none") {
    return engine;
  }
  return new PrivilegedExecutionEngine(
    engine,
    new PolkitPrivilegeEscalator({ launcher: config.launcher }),
    { allowlist: config.registryAllowlist, logger: engineLogger },
  );
}
