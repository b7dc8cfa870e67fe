import { promises as fs } from "node:fs";
import {
  AttachmentNotFoundError,
  AttachmentUnreadableError,
  BinaryAttachmentError,
  errnoCode,
  errorMessage,
} from "@clia/shared";

export const BINARY_SNIFF_BYTES = 8192;

export const looksBinary = (content: Buffer): boolean =>
  content.subarray(0, BINARY_SNIFF_BYTES).includes(0);

export const readAttachment = async (filePath: string): Promise<string> => {
  let content: Buffer;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT") throw new AttachmentNotFoundError(filePath, error);
    if (code === "EISDIR") throw new AttachmentUnreadableError(filePath, "is a directory", error);
    throw new AttachmentUnreadableError(filePath, errorMessage(error), error);
  }
  if (looksBinary(content)) {
    throw new BinaryAttachmentError(filePath);
  }
  return content.toString("utf8").trim();
};
