import express, {
  type ErrorRequestHandler,
  type Express,
} from "express";
import type {
  ExecutionEngine,
  RegistryAllowlist,
} from "@atomic-image-manager/executor";
import type { OperationEvent } from "./domain/operation.js";
import { createLogger, type Logger } from "./observability/logger.js";
import type { ImageTagSource } from "./ports/image-tag-source.js";
import type { StatusSource } from "./ports/status-source.js";
import type { HistoryLedger } from "./repositories/history-ledger.js";
import { createActionsRouter } from "./routes/actions.js";
import { createCatalogRouter } from "./routes/catalog.js";
import { createDeploymentsRouter } from "./routes/deployments.js";
import { createHealthRouter } from "./routes/health.js";
import { createHistoryRouter } from "./routes/history.js";
import { createImageTagsRouter } from "./routes/image-tags.js";
import { createOperationsRouter } from "./routes/operations.js";
import { ActionDispatcher } from "./services/action-dispatcher.js";
import { PendingConfirmationRegistry } from "./services/confirmation-gate.js";
import type { ImageCatalog } from "./services/image-catalog.js";
import { ImageOrchestrator } from "./services/image-orchestrator.js";
import { ImageTagFinder } from "./services/image-tags.js";
import {
  CompositeProgressObserver,
  LoggingProgressObserver,
  StreamBusProgressObserver,
} from "./services/progress-observer.js";
import type { Scheduler } from "./services/scheduler.js";
import { StreamBus } from "./services/stream-bus.js";

export interface CreateImageManagerAppOptions {
  readonly engine: ExecutionEngine;
  readonly statusSource: StatusSource;
  readonly ledger: HistoryLedger;
  readonly catalog: ImageCatalog;
  /** Mounts `GET /api/images/tags` when given. */
  readonly tagSource?: ImageTagSource;
  readonly allowlist?: RegistryAllowlist;
  readonly scheduler?: Scheduler;
  readonly confirmations?: PendingConfirmationRegistry;
  readonly streamBus?: StreamBus<OperationEvent>;
  readonly heartbeatMs?: number;
  readonly logger?: Logger;
}

export interface ImageManagerApp {
  readonly app: Express;
  readonly orchestrator: ImageOrchestrator;
  readonly dispatcher: ActionDispatcher;
  readonly confirmations: PendingConfirmationRegistry;
  readonly streamBus: StreamBus<OperationEvent>;
}

export function createImageManagerApp(
  options: CreateImageManagerAppOptions,
): ImageManagerApp {
  const app = express();
  app.use(express.json());

  const logger =
    options.logger ?? createLogger({ component: "image-manager" });
  const confirmations =
    options.confirmations ?? new PendingConfirmationRegistry();
  const streamBus = options.streamBus ?? new StreamBus<OperationEvent>();

  const orchestrator = new ImageOrchestrator({
    engine: options.engine,
    statusSource: options.statusSource,
    ledger: options.ledger,
    presenter: confirmations,
    scheduler: options.scheduler,
    observer: new CompositeProgressObserver([
      new StreamBusProgressObserver(streamBus),
      new LoggingProgressObserver(logger),
    ]),
    streamBus,
    allowlist: options.allowlist,
    catalog: options.catalog,
    logger,
  });
  const dispatcher = new ActionDispatcher({
    orchestrator,
    statusSource: options.statusSource,
    ledger: options.ledger,
    catalog: options.catalog,
  });

  app.use(createHealthRouter(orchestrator));
  app.use("/api", createDeploymentsRouter(options.statusSource));
  app.use("/api", createHistoryRouter(options.ledger));
  app.use("/api", createCatalogRouter(options.catalog));
  if (options.tagSource) {
    app.use(
      "/api",
      createImageTagsRouter(
        new ImageTagFinder({
          source: options.tagSource,
          allowlist: options.allowlist,
        }),
      ),
    );
  }
  app.use(
    "/api",
    createOperationsRouter({
      orchestrator,
      dispatcher,
      confirmations,
      streamBus,
      heartbeatMs: options.heartbeatMs,
    }),
  );
  app.use("/api", createActionsRouter(dispatcher));
  app.use(createErrorHandler(logger));

  return { app, orchestrator, dispatcher, confirmations, streamBus };
}

function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    logger.error("request failed", {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
    });
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: "internal error" });
  };
}
