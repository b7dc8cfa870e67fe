import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { captureFileExists, parseCaptureBlocks, readLastCapture, stripAnsi } from "../TerminalCaptureReader.js";

const withCaptureFile = async (content: string | undefined, fn: (file: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "clia-capture-"));
  const file = path.join(dir, "terminal.log");
  try {
    if (content !== undefined) await fs.writeFile(file, content, "utf8");
    await fn(file);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

const line = (command: string, output: string): string => `${JSON.stringify({ command, output })}\n`;

test("stripAnsi removes colour and cursor sequences", () => {
  assert.equal(stripAnsi("\u001b[31mred\u001b[0m \u001b[2Kdone"), "red done");
});

test("missing capture file yields undefined", async () => {
  await withCaptureFile(undefined, async (file) => {
    assert.equal(await readLastCapture(file), undefined);
  });
});

test("the last block wins and trailing exit blocks are skipped", async () => {
  const content =
    line("ls", "a.txt b.txt") + line("df -h", "\u001b[1m/dev/sda1  90%\u001b[0m\n") + line("exit", "logout\nexit");
  await withCaptureFile(content, async (file) => {
    assert.equal(await readLastCapture(file), "/dev/sda1  90%");
  });
});

test("parsing stops at the first line that is not JSON", () => {
  const blocks = parseCaptureBlocks(line("pwd", "/home/test") + "garbage\n" + line("ls", "ignored"));
  assert.deepEqual(blocks, [{ command: "pwd", output: "/home/test" }]);
});

test("a plain-text capture file is used whole", async () => {
  await withCaptureFile("\u001b[32m$ make\u001b[0m\nerror: missing target\n", async (file) => {
    assert.equal(await readLastCapture(file), "$ make\nerror: missing target");
  });
});

test("a plain-text capture keeps the text after the last prompt separator", async () => {
  await withCaptureFile("$ ls\na.txt\n$ make\nerror: missing target\n$ ", async (file) => {
    assert.equal(await readLastCapture(file, { promptSeparator: "$" }), "make\nerror: missing target");
  });
});

test("an empty capture file yields undefined", async () => {
  await withCaptureFile("\n\n", async (file) => {
    assert.equal(await readLastCapture(file), undefined);
  });
});

test("captureFileExists reports whether the recorder has started", async () => {
  await withCaptureFile(undefined, async (file) => {
    assert.equal(await captureFileExists(file), false);
  });
  await withCaptureFile("", async (file) => {
    assert.equal(await captureFileExists(file), true);
  });
});
