/**
 * Purpose: Command-line host over the evaluation engine.
 * Intent: Keep file access and output behind an injectable io so commands can be exercised in-process.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { Chalk } from "chalk";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { EngineOptions } from "../config.js";
import { evaluateDocument, renderDocument, replaceReferencesWithValues } from "../document_evaluate.js";
import { adjustReferences, findDependentLines } from "../document_refs.js";
import { errorInfo } from "../errors.js";
import { createServiceLogger } from "../logger.js";

export interface CliIO {
  readFile(path: string): string;
  writeFile(path: string, text: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
  color: boolean;
}

export function nodeIo(): CliIO {
  return {
    readFile: (path) => readFileSync(path, "utf8"),
    writeFile: (path, text) => writeFileSync(path, text, "utf8"),
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    color: process.stdout.isTTY === true,
  };
}

const logger = createServiceLogger("cli");

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

interface EvalFlags {
  write?: boolean;
  activeLine?: number;
  now?: string;
  tz?: string;
}

function engineOptions(flags: EvalFlags): EngineOptions {
  const options: EngineOptions = {};
  if (flags.activeLine !== undefined) options.activeLine = flags.activeLine;
  if (flags.now !== undefined) options.now = new Date(flags.now);
  if (flags.tz !== undefined) options.timeZone = flags.tz;
  return options;
}

export function buildProgram(io: CliIO): Command {
  const chalk = new Chalk({ level: io.color ? 1 : 0 });
  const program = new Command();

  program
    .name("linepad")
    .description("Evaluate line-oriented calculation documents")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command("eval")
    .description("Evaluate every line ending in '=' and print the document")
    .argument("<file>", "document to evaluate")
    .option("-w, --write", "write the result back to the file")
    .option("--active-line <n>", "1-based line shown without re-spacing", positiveInt)
    .option("--now <datetime>", "fixed clock for now/today (ISO 8601)")
    .option("--tz <zone>", "IANA time zone for local dates")
    .action((file: string, flags: EvalFlags) => {
      const evaluated = evaluateDocument(io.readFile(file).split("\n"), engineOptions(flags));
      const failed = evaluated.filter((line) => line.error).length;
      if (flags.write) {
        io.writeFile(file, renderDocument(evaluated));
        logger.info("document written", { file, lines: evaluated.length, failed });
        return;
      }
      const lines = evaluated.map((line) => (line.error ? chalk.red(line.output) : line.output));
      io.stdout(lines.join("\n"));
    });

  program
    .command("adjust")
    .description("Rewrite \\N references in <new> after lines were inserted or deleted relative to <old>")
    .argument("<old>", "document before the edit")
    .argument("<new>", "document after the edit")
    .action((oldFile: string, newFile: string) => {
      io.stdout(adjustReferences(io.readFile(oldFile), io.readFile(newFile)));
    });

  program
    .command("deps")
    .description("List lines that reference <line>")
    .argument("<file>", "document to scan")
    .argument("<line>", "1-based line number", positiveInt)
    .option("-t, --transitive", "include lines that depend on dependents")
    .action((file: string, line: number, flags: { transitive?: boolean }) => {
      const lines = io.readFile(file).split("\n");
      const deps = findDependentLines(lines, line, { transitive: flags.transitive === true });
      io.stdout(deps.join("\n"));
    });

  program
    .command("values")
    .description("Print the document with each \\N replaced by its value")
    .argument("<file>", "document to read")
    .action((file: string) => {
      io.stdout(replaceReferencesWithValues(io.readFile(file)));
    });

  return program;
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // commander has already printed its own usage errors
    if (err instanceof CommanderError) return err.exitCode;
    const info = errorInfo(err);
    logger.error("command failed", info);
    io.stderr(new Chalk({ level: io.color ? 1 : 0 }).red(`Error: ${info.message}`));
    return 1;
  }
}
