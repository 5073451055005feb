import type { Operation, Stream } from "effection";

export interface ExecOptions {
  /**
   * Extra arguments appended to those parsed out of the command string.
   */
  arguments?: string[];

  /**
   * The complete environment of the child. When omitted, the child inherits
   * the environment of the current process.
   */
  env?: Record<string, string>;

  cwd?: string;
}

export interface ExitStatus {
  command: string;
  options: ExecOptions;

  /**
   * Exit code of the process, absent when it was terminated by a signal.
   */
  code?: number;

  /**
   * Name of the signal that terminated the process, if any.
   */
  signal?: string;
}

export interface ProcessResult extends ExitStatus {
  stdout: string;
  stderr: string;
}

export type OutputStream = Stream<Uint8Array, void>;

export interface Process {
  readonly pid: number;
  stdout: OutputStream;
  stderr: OutputStream;

  /**
   * Wait for the process to finish, whatever its exit status. Fails when the
   * process could not be started at all.
   */
  join(): Operation<ExitStatus>;
}

export interface CreateOSProcess {
  (command: string, options: ExecOptions): Operation<Process>;
}
