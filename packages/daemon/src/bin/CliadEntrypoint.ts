#!/usr/bin/env node
import dbus from "dbus-next";
import type { MessageBus } from "dbus-next";
import packageJson from "../../package.json" with { type: "json" };
import { ConfigError, type CliaConfig } from "@clia/shared";
import { AuditLogger, createChildLogger, createLogger, loadConfig, type Logger } from "@clia/core";
import { BusDispatcher } from "../bus/BusDispatcher.js";
import { DbusTransport } from "../bus/DbusTransport.js";
import { ContextActivator, buildDaemonContext, type ContextFactory, type DaemonContextDeps } from "../context/DaemonContext.js";
import { DAEMON_ENDPOINTS } from "../endpoints/index.js";
import { FilePolicySource, StaticPolicySource, type PolicySource } from "../policy/AccessPolicy.js";
import { Supervisor } from "../supervisor/Supervisor.js";

export interface RunDaemonOptions {
  env?: NodeJS.ProcessEnv;
  bus?: () => MessageBus;
  contextDeps?: DaemonContextDeps;
}

const policySourceFor = (config: CliaConfig, logger: Logger): PolicySource =>
  config.policy.file ? new FilePolicySource(config.policy.file, createChildLogger(logger, "policy")) : new StaticPolicySource();

/** Starts the daemon and resolves with its exit code once it has stopped. */
export const runDaemon = async (options: RunDaemonOptions = {}): Promise<number> => {
  const env = options.env ?? process.env;
  let config: CliaConfig;
  try {
    config = await loadConfig({ env });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(`error[${error.kind}]: ${error.message}`);
    return 1;
  }

  const logger = createLogger({ level: config.logging.level });
  logger.info({ version: packageJson.version }, "cliad starting");

  const policy = policySourceFor(config, logger);
  try {
    await policy.current();
  } catch (error) {
    logger.fatal({ err: error }, "access policy could not be loaded");
    return 1;
  }

  const audit = new AuditLogger({
    file: config.logging.audit.file,
    enabled: config.logging.audit.enabled,
    fallback: createChildLogger(logger, "audit"),
  });
  const factoryFor =
    (current: CliaConfig): ContextFactory =>
    () =>
      buildDaemonContext(current, logger, { env, ...options.contextDeps });

  let supervisor: Supervisor | undefined;
  const activator = new ContextActivator(factoryFor(config), (error) => {
    logger.fatal({ err: error }, "daemon context activation failed");
    void supervisor?.stop("activation-failed", 1);
  });
  const dispatcher = new BusDispatcher({
    endpoints: DAEMON_ENDPOINTS,
    policy,
    activator,
    audit,
    logger: createChildLogger(logger, "dispatcher"),
    requestTimeoutMs: config.daemon.requestTimeoutMs,
  });
  const bus = (options.bus ?? dbus.systemBus)();
  supervisor = new Supervisor({
    dispatcher,
    activator,
    transport: new DbusTransport(bus, dispatcher, createChildLogger(logger, "transport")),
    audit,
    logger: createChildLogger(logger, "supervisor"),
    idleTimeoutMs: config.daemon.idleTimeoutMs,
  });
  // Policy and logging settings stay as started; the rest applies from the next activation.
  supervisor.installSignalHandlers(process, async () => factoryFor(await loadConfig({ env })));
  await supervisor.start();
  return supervisor.done;
};

const invokedAs = process.argv[1] ?? "";
if (invokedAs.endsWith("CliadEntrypoint.js") || invokedAs.endsWith("cliad")) {
  runDaemon()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
