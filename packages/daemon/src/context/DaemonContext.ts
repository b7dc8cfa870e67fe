import type { CliaConfig } from "@clia/shared";
import { openHistoryStore, type DatabaseCredentials, type HistoryStore } from "@clia/db";
import {
  CredentialResolver,
  HistoryService,
  HttpBackendClient,
  SessionManager,
  createChildLogger,
  type BackendClient,
  type Logger,
} from "@clia/core";

/**
 * Process-wide state shared by every endpoint. Built once on the first call
 * and handed to each handler; nothing here is a module-level global.
 */
export interface DaemonContext {
  config: CliaConfig;
  store: HistoryStore;
  sessions: SessionManager;
  history: HistoryService;
  backend: BackendClient;
  logger: Logger;
}

export interface DaemonContextDeps {
  env?: NodeJS.ProcessEnv;
  openStore?: (config: CliaConfig, credentials: DatabaseCredentials) => Promise<HistoryStore>;
  createBackend?: (config: CliaConfig, logger: Logger) => BackendClient;
}

/** Credential resolution, then the store, then the session manager. */
export const buildDaemonContext = async (
  config: CliaConfig,
  logger: Logger,
  deps: DaemonContextDeps = {},
): Promise<DaemonContext> => {
  const resolver = CredentialResolver.forDatabase(
    config.database,
    deps.env ?? process.env,
    config.daemon.requestTimeoutMs,
  );
  const credentials = await resolver.resolveDatabaseCredentials(config.database.type);
  const store = deps.openStore
    ? await deps.openStore(config, credentials)
    : await openHistoryStore(config.database, credentials, { logger: createChildLogger(logger, "store") });
  logger.info({ backend: store.backend }, "history store opened");
  const backendLogger = createChildLogger(logger, "backend");
  return {
    config,
    store,
    sessions: new SessionManager(store, createChildLogger(logger, "sessions")),
    history: new HistoryService(store, { enabled: config.history.enabled }),
    backend: deps.createBackend
      ? deps.createBackend(config, backendLogger)
      : new HttpBackendClient(config.backend, { logger: backendLogger }),
    logger,
  };
};

export interface CloseContextOptions {
  /** False on reload: open sessions are detached for the next context instead of ended. */
  endSessions?: boolean;
}

/** Returns the sessions left open when `endSessions` is false. */
export const closeDaemonContext = async (
  context: DaemonContext,
  options: CloseContextOptions = {},
): Promise<ReadonlyMap<string, string>> => {
  let carried: ReadonlyMap<string, string> = new Map();
  if (options.endSessions === false) {
    carried = context.sessions.detach();
  } else {
    const closed = await context.sessions.closeAll();
    if (closed) context.logger.info({ sessions: closed }, "open chat sessions ended");
  }
  await context.backend.close();
  await context.store.close();
  return carried;
};

export type ContextFactory = () => Promise<DaemonContext>;

/**
 * Builds the context at most once; concurrent first calls share the same
 * activation. A failed activation stays failed and is reported once.
 */
export class ContextActivator {
  private pending?: Promise<DaemonContext>;
  private current?: DaemonContext;
  private carried: ReadonlyMap<string, string> = new Map();

  constructor(
    private factory: ContextFactory,
    private onFailure?: (error: unknown) => void,
  ) {}

  get activated(): boolean {
    return this.pending !== undefined;
  }

  /** Sessions still open, including those waiting to be adopted after a reload. */
  get openSessionCount(): number {
    return this.current ? this.current.sessions.openSessionCount : this.carried.size;
  }

  get(): Promise<DaemonContext> {
    if (!this.pending) {
      this.pending = this.activate();
      this.pending.catch((error: unknown) => this.onFailure?.(error));
    }
    return this.pending;
  }

  /**
   * Closes the active context; the next call activates again from `factory`.
   * Passing a factory is a reload, so open sessions move to the next context.
   */
  async close(factory?: ContextFactory): Promise<void> {
    const pending = this.pending;
    this.pending = undefined;
    this.current = undefined;
    if (factory) this.factory = factory;
    if (!pending) return;
    const context = await pending.catch(() => undefined);
    if (!context) return;
    const carried = await closeDaemonContext(context, { endSessions: factory === undefined });
    if (factory) this.carried = carried;
  }

  private async activate(): Promise<DaemonContext> {
    const context = await this.factory();
    context.sessions.adopt(this.carried);
    this.carried = new Map();
    this.current = context;
    return context;
  }
}
