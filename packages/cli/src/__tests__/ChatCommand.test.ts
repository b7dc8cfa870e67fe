import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  AttachmentNotFoundError,
  BackendTimeoutError,
  ConfigError,
  EmptyQueryError,
  ResponseGeneratedButNotStoredError,
  SessionNotFoundError,
  createDefaultConfig,
} from "@clia/shared";
import { ChatCommand, parseChatArgs } from "../commands/chat/ChatCommand.js";
import { UsageError } from "../errors/ErrorReporter.js";
import { createFakeContext } from "./support/FakeContext.js";

const withTempDir = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "clia-chat-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};

test("parseChatArgs joins words into the query and reads flags", () => {
  assert.deepEqual(parseChatArgs(["how", "do", "I", "-a", "notes.txt", "-w"]), {
    query: "how do I",
    attachment: "notes.txt",
    withOutput: true,
    interactive: false,
    list: false,
    deleteAll: false,
    help: false,
  });
  assert.deepEqual(parseChatArgs(["--interactive", "--attachment=log.txt"]), {
    attachment: "log.txt",
    withOutput: false,
    interactive: true,
    list: false,
    deleteAll: false,
    help: false,
  });
  assert.equal(parseChatArgs(["--", "-rf", "means what"]).query, "-rf means what");
});

test("parseChatArgs rejects unknown options and a missing attachment path", () => {
  assert.throws(() => parseChatArgs(["-x"]), (error: unknown) => {
    assert.ok(error instanceof UsageError);
    assert.equal(error.message, "Unknown option: -x");
    return true;
  });
  assert.throws(() => parseChatArgs(["-a"]), /-a needs a file path/);
});

test("a positional question is sent as is and the answer printed", async () => {
  const context = createFakeContext();
  context.client.answer = async () => ({ response: "use ls -la", truncated: false, stored: true });
  await ChatCommand.run(["list", "hidden", "files"], context);
  assert.deepEqual(context.client.submitted, [{ positional: "list hidden files" }]);
  assert.deepEqual(context.out, ["use ls -la"]);
  assert.deepEqual(context.err, []);
});

test("piped stdin is forwarded when stdin is not a terminal", async () => {
  const context = createFakeContext({ stdin: "kernel: oops\n" });
  await ChatCommand.run([], context);
  assert.deepEqual(context.client.submitted, [{ stdin: "kernel: oops\n" }]);
});

test("attachments and the last terminal capture are read locally", async () => {
  await withTempDir(async (dir) => {
    const attachment = path.join(dir, "notes.txt");
    const capture = path.join(dir, "terminal.log");
    await fs.writeFile(attachment, "selinux=enforcing\n", "utf8");
    await fs.writeFile(
      capture,
      [
        JSON.stringify({ command: "ls", output: "a b c" }),
        JSON.stringify({ command: "cat x", output: "\u001b[31mno such file\u001b[0m" }),
      ].join("\n"),
      "utf8",
    );
    const config = createDefaultConfig();
    config.output.file = capture;
    const context = createFakeContext({ config });
    await ChatCommand.run(["explain", "-a", attachment, "-w"], context);
    assert.deepEqual(context.client.submitted, [
      { positional: "explain", attachment: "selinux=enforcing", lastCapture: "no such file" },
    ]);
  });
});

test("a missing capture file only warns", async () => {
  await withTempDir(async (dir) => {
    const config = createDefaultConfig();
    config.output.file = path.join(dir, "absent.log");
    const context = createFakeContext({ config });
    await ChatCommand.run(["why", "-w"], context);
    assert.deepEqual(context.client.submitted, [{ positional: "why" }]);
    assert.deepEqual(context.err, [`warning: no terminal output was found in ${config.output.file}`]);
  });
});

test("a missing attachment fails before the daemon is contacted", async () => {
  const context = createFakeContext();
  await assert.rejects(ChatCommand.run(["q?", "-a", "/nonexistent/clia/file.txt"], context), AttachmentNotFoundError);
  assert.deepEqual(context.client.submitted, []);
});

test("no input at all is an EmptyQueryError raised locally", async () => {
  const context = createFakeContext();
  await assert.rejects(ChatCommand.run([], context), EmptyQueryError);
  assert.deepEqual(context.client.submitted, []);
});

test("a trimmed question prints a warning next to the answer", async () => {
  const context = createFakeContext();
  context.client.answer = async () => ({ response: "short answer", truncated: true, stored: true });
  await ChatCommand.run(["long", "question"], context);
  assert.deepEqual(context.out, ["short answer"]);
  assert.deepEqual(context.err, [
    "warning: the question and its context exceeded 2048 characters and were trimmed; some context may be lost.",
  ]);
});

test("an answer that could not be stored is still printed", async () => {
  const context = createFakeContext();
  context.client.answer = async () => {
    throw new ResponseGeneratedButNotStoredError("the answer");
  };
  await assert.rejects(ChatCommand.run(["question"], context), ResponseGeneratedButNotStoredError);
  assert.deepEqual(context.out, ["the answer"]);
});

test("interactive mode runs one session until .exit", async () => {
  const context = createFakeContext({ lines: ["first question", "   ", ".exit", "never sent"] });
  await ChatCommand.run(["-i"], context);
  assert.deepEqual(context.client.userIdLookups, [1000]);
  assert.deepEqual(context.client.submitted, [{ positional: "first question", sessionId: "session-1" }]);
  assert.deepEqual(context.client.ended, ["session-1"]);
  assert.deepEqual(context.out, ["Interactive chat started. Type .exit to leave.", "ok"]);
  assert.deepEqual(context.err, ["Your question can't be empty. Please, try again."]);
});

test("interactive mode reports a failed question and keeps going", async () => {
  const context = createFakeContext({ lines: ["slow one", "fast one"] });
  let calls = 0;
  context.client.answer = async () => {
    calls += 1;
    if (calls === 1) throw new BackendTimeoutError(30_000);
    return { response: "quick", truncated: false, stored: true, sessionId: "session-1" };
  };
  await ChatCommand.run(["--interactive"], context);
  assert.deepEqual(context.err, ["error[BackendTimeoutError]: The inference backend did not answer within 30000ms."]);
  assert.deepEqual(context.out, ["Interactive chat started. Type .exit to leave.", "quick"]);
  assert.deepEqual(context.client.ended, ["session-1"]);
});

test("parseChatArgs reads session options and rejects conflicting ones", () => {
  const parsed = parseChatArgs(["-i", "-n", "work", "--description=deploy notes"]);
  assert.equal(parsed.name, "work");
  assert.equal(parsed.description, "deploy notes");
  assert.equal(parseChatArgs(["--delete", "work"]).delete, "work");
  assert.equal(parseChatArgs(["-l"]).list, true);

  assert.throws(() => parseChatArgs(["--list", "--delete-all"]), /Choose only one of --list, --delete or --delete-all/);
  assert.throws(() => parseChatArgs(["-l", "what", "now"]), /cannot be combined with a question/);
  assert.throws(() => parseChatArgs(["--name", "work", "question"]), /only apply to --interactive/);
  assert.throws(() => parseChatArgs(["-d"]), /-d needs a value/);
});

test("--list prints each session with its state", async () => {
  const context = createFakeContext();
  context.client.sessions = [
    {
      id: "s2",
      userId: "user-1",
      name: "work",
      description: "deploy notes",
      createdAt: "2026-01-02T00:00:00.000Z",
    },
    {
      id: "s1",
      userId: "user-1",
      name: "default",
      createdAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T01:00:00.000Z",
    },
  ];
  await ChatCommand.run(["--list"], context);
  assert.deepEqual(context.out, [
    "2026-01-02T00:00:00.000Z  work  deploy notes  (open)",
    "2026-01-01T00:00:00.000Z  default",
  ]);
});

test("--list without sessions says so", async () => {
  const context = createFakeContext();
  await ChatCommand.run(["-l"], context);
  assert.deepEqual(context.out, ["No chat sessions found."]);
});

test("--delete removes sessions by name and --delete-all removes the rest", async () => {
  const context = createFakeContext();
  await context.client.startSession({ name: "work" });
  await context.client.startSession({});
  await context.client.startSession({});

  await ChatCommand.run(["--delete", "work"], context);
  await ChatCommand.run(["--delete-all"], context);
  assert.deepEqual(context.client.sessionDeletes, ["work", undefined]);
  assert.deepEqual(context.out, [
    "Deleted 1 chat session; their history is kept.",
    "Deleted 2 chat sessions; their history is kept.",
  ]);
  assert.deepEqual(context.client.submitted, []);
});

test("interactive mode names the session it starts", async () => {
  const context = createFakeContext({ lines: [".exit"] });
  await ChatCommand.run(["-i", "--name", "work", "--description", "deploy notes"], context);
  assert.deepEqual(context.client.started, [{ name: "work", description: "deploy notes" }]);
  assert.deepEqual(context.client.ended, ["session-1"]);
});

test("interactive mode starts a new session when the daemon lost the old one", async () => {
  const context = createFakeContext({ lines: ["still there?"] });
  context.client.answer = async (input) => {
    if (input.sessionId === "session-1") throw new SessionNotFoundError("session-1");
    return { response: "yes", truncated: false, stored: true, sessionId: input.sessionId };
  };
  await ChatCommand.run(["-i", "-n", "work"], context);
  assert.deepEqual(context.client.submitted, [
    { positional: "still there?", sessionId: "session-1" },
    { positional: "still there?", sessionId: "session-2" },
  ]);
  assert.deepEqual(context.client.started, [{ name: "work" }, { name: "work" }]);
  assert.deepEqual(context.err, ["The chat session was lost; continuing in new session session-2."]);
  assert.deepEqual(context.out, ["Interactive chat started. Type .exit to leave.", "yes"]);
  assert.deepEqual(context.client.ended, ["session-2"]);
});

test("enforce_script refuses to chat until the recorded session exists", async () => {
  await withTempDir(async (dir) => {
    const config = createDefaultConfig();
    config.output.enforceScript = true;
    config.output.file = path.join(dir, "session.log");
    const context = createFakeContext({ config });
    await assert.rejects(ChatCommand.run(["why"], context), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(
        error.message,
        `output.enforce_script is set but ${config.output.file} does not exist; start a recorded shell session first.`,
      );
      return true;
    });
    assert.deepEqual(context.client.submitted, []);

    await fs.writeFile(config.output.file, "", "utf8");
    await ChatCommand.run(["why"], context);
    assert.deepEqual(context.client.submitted, [{ positional: "why" }]);
  });
});

test("a plain-text recording is cut at the configured prompt separator", async () => {
  await withTempDir(async (dir) => {
    const config = createDefaultConfig();
    config.output.file = path.join(dir, "session.log");
    config.output.promptSeparator = "#";
    await fs.writeFile(config.output.file, "# uptime\n up 3 days\n# df -h\n/dev/sda1 91%\n# ", "utf8");
    const context = createFakeContext({ config });
    await ChatCommand.run(["disk", "full?", "-w"], context);
    assert.deepEqual(context.client.submitted, [
      { positional: "disk full?", lastCapture: "df -h\n/dev/sda1 91%" },
    ]);
  });
});
