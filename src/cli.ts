/**
 * artifetch command line
 *
 * Thin argument layer over `fetch`. Prints the fetched path on stdout,
 * logs and errors on stderr.
 */

import chalk from "chalk";
import { Command, CommanderError, Option } from "commander";
import { isArtifetchError, type EngineContext, type Logger } from "#/core";
import { VERSION } from "#/constants";
import { PROVIDER_KEYS } from "#/providers";
import type { RequestedKind } from "#/source";
import { createNodeContext, fetch } from "./fetch";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  io?: CliIo;
  /** Context factory; defaults to Node-backed I/O and configuration from the environment */
  createContext?: (logger: Logger) => EngineContext;
}

type CliOptions = {
  dest: string;
  provider?: string;
  branch?: string;
  kind: RequestedKind;
  verbose?: boolean;
};

const KIND_CHOICES: RequestedKind[] = ["auto", "repo", "dir", "file"];

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Logger writing coloured lines to stderr. Debug lines only when verbose.
 */
export function createCliLogger(write: (text: string) => void, verbose: boolean): Logger {
  return {
    debug: (message) => {
      if (verbose) write(`${chalk.gray(message)}\n`);
    },
    info: (message) => write(`${chalk.green(message)}\n`),
    warn: (message) => write(`${chalk.yellow(message)}\n`),
    error: (message) => write(`${chalk.red(message)}\n`),
  };
}

/**
 * Format error for display.
 */
export function formatError(error: unknown, verbose = false): string {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [chalk.red(`Error: ${message}`)];

  if (verbose && isArtifetchError(error) && error.cause instanceof Error) {
    lines.push(chalk.gray(`  Cause: ${error.cause.name}`));
  }
  return lines.join("\n");
}

/**
 * Create the CLI program. The action runs `fetch` and writes the resulting path.
 */
export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIo;

  const program = new Command()
    .name("artifetch")
    .description("Fetch a repository, a directory, a file or an artifact from a source URI")
    .version(VERSION)
    .argument("<source>", "gitlab://, github://, artifactory:// or git URL")
    .option("-d, --dest <dir>", "destination directory", ".")
    .addOption(
      new Option("-p, --provider <provider>", "provider (auto-detected otherwise)").choices(
        Object.keys(PROVIDER_KEYS)
      )
    )
    .option("-b, --branch <ref>", "branch, tag or sha")
    .addOption(
      new Option("-k, --kind <kind>", "what to fetch from a content source").choices(KIND_CHOICES).default("auto")
    )
    .option("-v, --verbose", "show debug output")
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .exitOverride()
    .action(async (source: string) => {
      const options = program.opts<CliOptions>();
      const logger = createCliLogger((text) => io.stderr(text), options.verbose ?? false);
      const context = deps.createContext ? deps.createContext(logger) : createNodeContext({ logger });

      const result = await fetch(
        source,
        {
          dest: options.dest,
          provider: options.provider,
          branch: options.branch,
          kind: options.kind,
        },
        context
      );
      io.stdout(`${result}\n`);
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const program = createProgram(deps);

  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (error) {
    // Commander already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr(`${formatError(error, program.opts<CliOptions>().verbose ?? false)}\n`);
    return 1;
  }
}
