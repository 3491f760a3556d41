#!/usr/bin/env node

/**
 * Lime interpreter CLI (lime)
 *
 * Usage:
 *   lime <program.lime>
 *   lime --continue <program.lime>
 *   lime --help
 */

import { readFileSync } from "node:fs";
import tkexport from "terminal-kit";
import { runCli } from "../lib/cli.js";
import { stdinLineReader, stdoutLineWriter } from "../lib/io/lineIo.js";

const { createTerminal } = tkexport;

const errorTerminal = createTerminal({
  stdin: process.stdin,
  stdout: process.stderr,
  stderr: process.stderr,
});

function printRed(msg: string): void {
  errorTerminal.red(msg + "\n");
}

process.exitCode = runCli(process.argv.slice(2), {
  readFile: (path) => readFileSync(path, "utf8"),
  input: stdinLineReader(),
  output: stdoutLineWriter(),
  reportError: printRed,
});
