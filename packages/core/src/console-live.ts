/**
 * LiveConsoleOutput — real terminal output with colors via picocolors.
 *
 * Every level goes to stdout unless a separate error stream is given.
 */

import pc from "picocolors";
import type { ConsoleOutput } from "./console.js";

export type LiveConsoleStreams = {
  stdout?: NodeJS.WritableStream;
  /** Where error lines go. Default: the stdout stream */
  errors?: NodeJS.WritableStream;
};

function emit(stream: NodeJS.WritableStream, text: string, newline: boolean): void {
  stream.write(newline ? text + "\n" : text);
}

export class LiveConsoleOutput implements ConsoleOutput {
  private readonly stdout: NodeJS.WritableStream;
  private readonly errors: NodeJS.WritableStream;

  constructor(streams: LiveConsoleStreams = {}) {
    this.stdout = streams.stdout ?? process.stdout;
    this.errors = streams.errors ?? this.stdout;
  }

  write(text: string, newline = true): void {
    emit(this.stdout, text, newline);
  }

  error(text: string, newline = true): void {
    emit(this.errors, pc.red(text), newline);
  }

  warn(text: string, newline = true): void {
    emit(this.stdout, pc.yellow(text), newline);
  }

  info(text: string, newline = true): void {
    emit(this.stdout, pc.dim(text), newline);
  }
}
