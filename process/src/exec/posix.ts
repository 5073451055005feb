import { spawn as spawnProcess } from "node:child_process";
import process from "node:process";
import type { Readable } from "node:stream";
import {
  all,
  createSignal,
  Err,
  Ok,
  type Operation,
  type Result,
  sleep,
  spawn,
  withResolvers,
} from "effection";

import { once } from "../eventemitter.ts";
import { useReadable } from "../helpers.ts";
import type { CreateOSProcess, ExitStatus, OutputStream } from "./api.ts";

type CloseEvent = [number | null, NodeJS.Signals | null];

interface Pipe {
  stream: OutputStream;
  /** the first chunk, or end of input, has arrived */
  ready: Operation<void>;
  /** every chunk has been passed on */
  done: Operation<void>;
}

/**
 * Start `command` as the leader of a new process group, with no standard
 * input. When the scope that started it exits, the whole group receives
 * SIGTERM and both output pipes are drained before the scope is released.
 */
export const createPosixProcess: CreateOSProcess = function* createPosixProcess(
  command,
  options,
) {
  let closed = withResolvers<Result<CloseEvent>>();

  let child = spawnProcess(command, options.arguments ?? [], {
    detached: true,
    env: options.env,
    cwd: options.cwd,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let stdout = yield* pipe(child.stdout);
  let stderr = yield* pipe(child.stderr);

  yield* spawn(function* () {
    let [error] = yield* once<[Error]>(child, "error");
    closed.resolve(Err(error));
  });

  yield* spawn(function* () {
    try {
      let event = yield* once<CloseEvent>(child, "close");
      yield* all([stdout.ready, stderr.ready, sleep(1)]);
      closed.resolve(Ok(event));
    } finally {
      terminateGroup(child.pid);
      yield* all([stdout.done, stderr.done]);
    }
  });

  function* join(): Operation<ExitStatus> {
    let result = yield* closed.operation;
    if (!result.ok) {
      throw result.error;
    }
    let [code, signal] = result.value;
    return {
      command,
      options,
      code: code ?? undefined,
      signal: signal ?? undefined,
    };
  }

  return {
    pid: child.pid ?? -1,
    stdout: stdout.stream,
    stderr: stderr.stream,
    join,
  };
};

function* pipe(source: Readable): Operation<Pipe> {
  let chunks = yield* useReadable(source);
  let stream = createSignal<Uint8Array, void>();
  let ready = withResolvers<void>();
  let done = withResolvers<void>();

  yield* spawn(function* () {
    yield* once(source, "readable");
    ready.resolve();
    let next = yield* chunks.next();
    while (!next.done) {
      stream.send(next.value);
      next = yield* chunks.next();
    }
    stream.close();
    done.resolve();
  });

  return { stream, ready: ready.operation, done: done.operation };
}

function terminateGroup(pid: number | undefined): void {
  if (pid === undefined) {
    return;
  }
  try {
    process.kill(-pid, "SIGTERM");
  } catch (error) {
    // ESRCH: the group has exited. EPERM: its leader runs as another user
    // (sudo), which forwards the signal itself.
    if (!isErrno(error, "ESRCH") && !isErrno(error, "EPERM")) {
      throw error;
    }
  }
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
