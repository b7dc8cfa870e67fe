import { promises as fs } from "node:fs";
import { z } from "zod";
import { AttachmentUnreadableError, errnoCode, errorMessage } from "@clia/shared";

const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

const CaptureBlockSchema = z.object({
  command: z.string(),
  output: z.string(),
});

export interface CaptureBlock {
  command: string;
  output: string;
}

export const stripAnsi = (text: string): string => text.replace(ANSI_ESCAPE, "");

const clean = (text: string): string => stripAnsi(text).trim();

const parseLine = (line: string): unknown => {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
};

/**
 * Parses the shell integration's JSONL capture. Parsing stops at the first
 * line that is not JSON; blocks whose output ends in `exit` are the recorder
 * shutting down and are skipped.
 */
export const parseCaptureBlocks = (content: string): CaptureBlock[] => {
  const blocks: CaptureBlock[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    const parsed = parseLine(line);
    if (parsed === undefined) break;
    const block = CaptureBlockSchema.safeParse(parsed);
    if (!block.success) continue;
    const output = clean(block.data.output);
    if (output.endsWith("exit")) continue;
    blocks.push({ command: clean(block.data.command), output });
  }
  return blocks;
};

export interface ReadCaptureOptions {
  /** Splits a plain-text capture into prompts; the last non-empty segment wins. */
  promptSeparator?: string;
}

const lastSegment = (text: string, separator: string | undefined): string => {
  if (!separator) return text;
  const segments = text.split(separator).map((segment) => segment.trim());
  return segments.filter(Boolean).at(-1) ?? "";
};

/** True once the recorded shell session has created its output file. */
export const captureFileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return false;
    throw new AttachmentUnreadableError(filePath, errorMessage(error), error);
  }
};

export const readLastCapture = async (
  filePath: string,
  options: ReadCaptureOptions = {},
): Promise<string | undefined> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw new AttachmentUnreadableError(filePath, errorMessage(error), error);
  }
  const firstLine = content.split("\n").find((line) => line.trim());
  if (firstLine === undefined) return undefined;
  if (parseLine(firstLine) === undefined) {
    return lastSegment(clean(content), options.promptSeparator) || undefined;
  }
  const last = parseCaptureBlocks(content).at(-1);
  return last?.output || undefined;
};
