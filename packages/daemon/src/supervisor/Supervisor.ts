import type { AuditLogger, Logger } from "@clia/core";
import type { BusDispatcher } from "../bus/BusDispatcher.js";
import type { BusTransport } from "../bus/DbusTransport.js";
import type { ContextActivator, ContextFactory } from "../context/DaemonContext.js";

export type StopReason = "idle" | "signal" | "activation-failed" | "transport-failed";

export interface SupervisorOptions {
  dispatcher: BusDispatcher;
  activator: ContextActivator;
  transport: BusTransport;
  audit: AuditLogger;
  logger: Logger;
  /** 0 disables the idle timeout. */
  idleTimeoutMs: number;
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Owns the daemon's lifetime. The idle timer only runs while no call is in
 * flight and no chat session is open; every way out goes through `stop`.
 */
export class Supervisor {
  private idleTimer?: NodeJS.Timeout;
  private stopping?: Promise<number>;
  private readonly resolveDone: (exitCode: number) => void;
  readonly done: Promise<number>;

  constructor(private options: SupervisorOptions) {
    let settle: (exitCode: number) => void = () => undefined;
    this.done = new Promise<number>((resolve) => {
      settle = resolve;
    });
    this.resolveDone = settle;
    options.dispatcher.setActivityListener({
      onBusy: () => this.clearIdleTimer(),
      onIdle: () => this.armIdleTimer(),
    });
  }

  async start(): Promise<void> {
    try {
      await this.options.transport.start();
    } catch (error) {
      this.options.logger.error({ err: error }, "bus transport failed to start");
      await this.stop("transport-failed", 1);
      return;
    }
    this.options.logger.info({ idleTimeoutMs: this.options.idleTimeoutMs }, "daemon ready");
    this.armIdleTimer();
  }

  /** Runs once; later calls share the first stop. */
  stop(reason: StopReason, exitCode = 0): Promise<number> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason, exitCode);
    }
    return this.stopping;
  }

  /** Drains, closes the context and swaps in a fresh factory for the next call. */
  async reload(nextFactory: () => Promise<ContextFactory>): Promise<void> {
    if (this.stopping) return;
    const { dispatcher, activator, logger } = this.options;
    dispatcher.stopAccepting();
    try {
      const factory = await nextFactory();
      await dispatcher.drain();
      await activator.close(factory);
      dispatcher.deactivate();
      logger.info("configuration reloaded");
    } catch (error) {
      logger.error({ err: error }, "reload failed; keeping the previous configuration");
    } finally {
      if (!this.stopping) dispatcher.resumeAccepting();
    }
  }

  installSignalHandlers(source: SignalSource, reloadFactory: () => Promise<ContextFactory>): void {
    const onStop = () => {
      void this.stop("signal");
    };
    source.on("SIGTERM", onStop);
    source.on("SIGINT", onStop);
    source.on("SIGHUP", () => {
      void this.reload(reloadFactory);
    });
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    const { idleTimeoutMs, dispatcher, activator } = this.options;
    if (idleTimeoutMs <= 0 || this.stopping || dispatcher.inFlight > 0) return;
    if (activator.openSessionCount > 0) return;
    this.idleTimer = setTimeout(() => {
      void this.stop("idle");
    }, idleTimeoutMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = undefined;
  }

  private async shutdown(reason: StopReason, exitCode: number): Promise<number> {
    const { dispatcher, activator, transport, audit, logger } = this.options;
    logger.info({ reason }, "daemon stopping");
    dispatcher.stopAccepting();
    this.clearIdleTimer();
    let code = exitCode;
    try {
      await dispatcher.drain();
      await activator.close();
      dispatcher.deactivate();
      await transport.stop();
    } catch (error) {
      logger.error({ err: error }, "daemon did not stop cleanly");
      code = 1;
    }
    await audit.flush();
    logger.info({ reason, exitCode: code }, "daemon stopped");
    this.resolveDone(code);
    return code;
  }
}
