import readline from "node:readline/promises";
import { IdentityResolutionError, type CliaConfig } from "@clia/shared";
import { loadConfig } from "@clia/core";
import { DbusDaemonClient, type DaemonClient } from "../bus/DaemonClient.js";

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export interface StdinSource {
  /** True when stdin is a terminal rather than a pipe or file. */
  readonly isTTY: boolean;
  read(): Promise<string>;
}

export interface PromptSource {
  /** Yields each line typed at the prompt until end of input. */
  lines(prompt: string): AsyncIterable<string>;
}

export interface CommandContext {
  config: CliaConfig;
  client: DaemonClient;
  uid: number;
  io: CommandIO;
  stdin: StdinSource;
  prompt: PromptSource;
}

export type CommandContextFactory = () => Promise<CommandContext>;

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const processStdin: StdinSource = {
  get isTTY() {
    return process.stdin.isTTY === true;
  },
  async read() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8");
  },
};

export const terminalPrompt: PromptSource = {
  async *lines(prompt) {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt });
    try {
      rl.prompt();
      for await (const line of rl) {
        yield line;
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  },
};

const currentUid = (): number => {
  if (typeof process.getuid !== "function") {
    throw new IdentityResolutionError("This platform does not expose a numeric user id.");
  }
  return process.getuid();
};

export const createCommandContext: CommandContextFactory = async () => ({
  config: await loadConfig(),
  client: DbusDaemonClient.connect(),
  uid: currentUid(),
  io: consoleIO,
  stdin: processStdin,
  prompt: terminalPrompt,
});
