import { readFile } from "node:fs/promises";
import { Agent, ProxyAgent, fetch, type Dispatcher } from "undici";
import { z } from "zod";
import {
  BackendTimeoutError,
  BackendUnavailableError,
  CliaError,
  errorMessage,
  type BackendConfig,
} from "@clia/shared";
import type { Logger } from "../../logging/Logger.js";

export interface BackendContext {
  stdin?: string;
  attachment?: string;
  terminal?: string;
}

/** The only call the daemon makes to the inference service. */
export interface BackendClient {
  submit(question: string, context: BackendContext): Promise<string>;
  close(): Promise<void>;
}

export interface InferRequestBody {
  question: string;
  context: {
    stdin: string;
    attachments: { contents: string };
    terminal: { output: string };
  };
}

const InferResponseSchema = z.object({
  data: z.object({ text: z.string().optional() }).passthrough().optional(),
});

export const buildInferBody = (question: string, context: BackendContext): InferRequestBody => ({
  question,
  context: {
    stdin: context.stdin ?? "",
    attachments: { contents: context.attachment ?? "" },
    terminal: { output: context.terminal ?? "" },
  },
});

export interface HttpBackendClientOptions {
  logger?: Logger;
  /** Replaces the dispatcher built from the TLS and proxy settings. */
  dispatcher?: Dispatcher;
}

export class HttpBackendClient implements BackendClient {
  private dispatcher?: Promise<Dispatcher>;
  private owned = false;

  constructor(
    private config: BackendConfig,
    private options: HttpBackendClientOptions = {},
  ) {}

  get inferUrl(): string {
    const base = this.config.endpoint.endsWith("/") ? this.config.endpoint : `${this.config.endpoint}/`;
    return new URL("infer", base).toString();
  }

  async submit(question: string, context: BackendContext): Promise<string> {
    const dispatcher = await this.getDispatcher();
    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(this.inferUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(buildInferBody(question, context)),
        signal: controller.signal,
        dispatcher,
      });
      if (!response.ok) {
        const detail = (await response.text()).slice(0, 200);
        throw new BackendUnavailableError(`Inference backend answered ${response.status}: ${detail}`);
      }
      const parsed = InferResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendUnavailableError("Inference backend returned an unexpected response body.");
      }
      this.options.logger?.info({ status: response.status }, "got response from inference backend");
      return parsed.data.data?.text ?? "";
    } catch (error) {
      if (error instanceof CliaError) throw error;
      if (controller.signal.aborted) throw new BackendTimeoutError(timeoutMs);
      this.options.logger?.error({ err: error }, "inference backend request failed");
      throw new BackendUnavailableError(
        `There was a problem communicating with the inference backend: ${errorMessage(error)}`,
        error,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    if (!this.dispatcher || !this.owned) return;
    const dispatcher = await this.dispatcher.catch(() => undefined);
    await dispatcher?.close();
  }

  private getDispatcher(): Promise<Dispatcher> {
    if (this.options.dispatcher) return Promise.resolve(this.options.dispatcher);
    this.dispatcher ??= this.buildDispatcher();
    const pending = this.dispatcher;
    pending.catch(() => {
      // Let the next call retry reading the certificate files.
      if (this.dispatcher === pending) this.dispatcher = undefined;
    });
    return pending;
  }

  private async buildDispatcher(): Promise<Dispatcher> {
    const secure = this.inferUrl.startsWith("https:");
    const tls = secure ? await this.loadClientCertificate() : {};
    const proxy = secure ? this.config.proxies.https : this.config.proxies.http;
    this.owned = true;
    if (proxy) {
      return new ProxyAgent({ uri: proxy, requestTls: tls });
    }
    return new Agent({ connect: tls });
  }

  private async loadClientCertificate(): Promise<{ cert: Buffer; key: Buffer; rejectUnauthorized: boolean }> {
    const { certFile, keyFile, verifySsl } = this.config.auth;
    try {
      const [cert, key] = await Promise.all([readFile(certFile), readFile(keyFile)]);
      return { cert, key, rejectUnauthorized: verifySsl };
    } catch (error) {
      throw new BackendUnavailableError(
        `Could not read the client certificate (${certFile}, ${keyFile}): ${errorMessage(error)}`,
        error,
      );
    }
  }
}
