import {
  CliaError,
  IdentityResolutionError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UnknownMethodError,
  encodePayload,
  withTimeout,
  type EndpointName,
} from "@clia/shared";
import type { AuditLogger, AuditOutcome, Logger } from "@clia/core";
import type { CallerIdentity, PolicySource } from "../policy/AccessPolicy.js";
import type { ContextActivator } from "../context/DaemonContext.js";
import { findMethod, type EndpointDefinition, type HandlerCall } from "../endpoints/EndpointDefinition.js";
import { EndpointLifecycle } from "../endpoints/EndpointLifecycle.js";

export interface BusCall {
  endpoint: EndpointName;
  method: string;
  /** Unique bus name of the caller's connection. */
  sender: string;
  /** Null when the transport could not resolve who is calling. */
  caller: CallerIdentity | null;
  payload: string;
}

export interface ActivityListener {
  onBusy(): void;
  onIdle(): void;
}

export interface BusDispatcherOptions {
  endpoints: readonly EndpointDefinition[];
  policy: PolicySource;
  activator: ContextActivator;
  audit: AuditLogger;
  logger: Logger;
  requestTimeoutMs: number;
}

const outcomeOf = (error: unknown): AuditOutcome => (error instanceof CliaError ? error.kind : "InternalError");

/**
 * Transport-neutral request path: policy, method lookup, activation, the
 * handler under the request timeout, and an audit record whatever happened.
 */
export class BusDispatcher {
  private readonly endpoints = new Map<EndpointName, EndpointDefinition>();
  private readonly lifecycles = new Map<EndpointName, EndpointLifecycle>();
  private readonly work = new Set<Promise<unknown>>();
  private accepting = true;
  private listener?: ActivityListener;

  constructor(private options: BusDispatcherOptions) {
    for (const definition of options.endpoints) {
      this.endpoints.set(definition.name, definition);
      this.lifecycles.set(definition.name, new EndpointLifecycle(definition.name));
    }
  }

  get inFlight(): number {
    return this.work.size;
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  lifecycle(endpoint: EndpointName): EndpointLifecycle | undefined {
    return this.lifecycles.get(endpoint);
  }

  setActivityListener(listener: ActivityListener): void {
    this.listener = listener;
  }

  stopAccepting(): void {
    this.accepting = false;
  }

  resumeAccepting(): void {
    this.accepting = true;
  }

  /** Waits for every call and every handler still running, including timed-out ones. */
  async drain(): Promise<void> {
    while (this.work.size) {
      await Promise.allSettled([...this.work]);
    }
  }

  /** Returns every ready endpoint to idle after the context was closed. */
  deactivate(): void {
    for (const lifecycle of this.lifecycles.values()) lifecycle.deactivate();
  }

  dispatch(call: BusCall): Promise<string> {
    return this.track(this.handle(call));
  }

  private async handle(call: BusCall): Promise<string> {
    const audit: HandlerCall["audit"] = {};
    let outcome: AuditOutcome = "success";
    try {
      if (!this.accepting) throw new ServiceUnavailableError();
      const caller = call.caller;
      if (!caller) throw new IdentityResolutionError("Could not determine the identity of the caller.");
      const policy = await this.options.policy.current();
      policy.check(caller, call.endpoint);

      const definition = this.endpoints.get(call.endpoint);
      const handler = definition ? findMethod(definition, call.method) : undefined;
      const lifecycle = this.lifecycles.get(call.endpoint);
      if (!handler || !lifecycle) throw new UnknownMethodError(call.endpoint, call.method);

      const context = await this.activate(lifecycle);
      const controller = new AbortController();
      const timeoutMs = this.options.requestTimeoutMs;
      lifecycle.enter();
      const running = this.track(
        handler(context, { ...call, caller, signal: controller.signal, audit }).finally(() => lifecycle.leave()),
      );
      const result = await withTimeout(running, timeoutMs, () => {
        controller.abort();
        return new RequestTimeoutError(`${call.endpoint}.${call.method}`, timeoutMs);
      });
      return encodePayload(result);
    } catch (error) {
      outcome = outcomeOf(error);
      if (outcome === "InternalError") {
        this.options.logger.error({ err: error, endpoint: call.endpoint, method: call.method }, "call failed");
      }
      throw error;
    } finally {
      this.options.audit.record({
        endpoint: call.endpoint,
        method: call.method,
        caller: call.caller?.uid ?? null,
        outcome,
        query: audit.query,
      });
    }
  }

  private async activate(lifecycle: EndpointLifecycle) {
    lifecycle.beginActivation();
    try {
      const context = await this.options.activator.get();
      lifecycle.activated();
      return context;
    } catch (error) {
      lifecycle.activationFailed();
      throw error;
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    if (this.work.size === 0) this.listener?.onBusy();
    this.work.add(promise);
    const settle = () => {
      this.work.delete(promise);
      if (this.work.size === 0) this.listener?.onIdle();
    };
    promise.then(settle, settle);
    return promise;
  }
}
