import type { EndpointName } from "@clia/shared";
import type { CallerIdentity } from "../policy/AccessPolicy.js";
import type { DaemonContext } from "../context/DaemonContext.js";

export interface HandlerCall {
  endpoint: EndpointName;
  method: string;
  caller: CallerIdentity;
  payload: string;
  /** Aborted when the caller stopped waiting (request timeout). */
  signal: AbortSignal;
  /** Filled in by the handler; recorded in the audit log. */
  audit: { query?: string };
}

export type MethodHandler = (context: DaemonContext, call: HandlerCall) => Promise<unknown>;

export interface EndpointDefinition {
  name: EndpointName;
  methods: Readonly<Record<string, MethodHandler>>;
}

export const findMethod = (definition: EndpointDefinition, method: string): MethodHandler | undefined =>
  Object.hasOwn(definition.methods, method) ? definition.methods[method] : undefined;
