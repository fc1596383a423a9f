#!/usr/bin/env node

import fs from "fs";
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { loadReflowConfig } from "../core/config-loader";
import {
  formatFiles,
  formatSource,
  resolveSourceFiles,
} from "../core/format";
import { createPrettyServer, listen } from "../core/server";
import { initConfig } from "../core/init";
import { watchSources } from "../core/watcher";
import { resolveConfig, type ResolvedReflowConfig } from "../schema";
import { defaultLogger, type Logger } from "../util/logger";
import { toPosixPath } from "../util/fs-utils";

interface BaseCliOptions {
  config?: string;
  write?: boolean;
  check?: boolean;
  watch?: boolean;
  maxLineWidth?: number;
  report?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface ServeCliOptions {
  port: number;
  host: string;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

async function loadEffectiveConfig(
  cwd: string,
  baseOpts: BaseCliOptions,
): Promise<ResolvedReflowConfig> {
  const { config } = await loadReflowConfig(cwd, {
    configPath: baseOpts.config,
  });
  return resolveConfig(config, { maxLineWidth: baseOpts.maxLineWidth });
}

async function handleFormatCommand(
  cwd: string,
  paths: string[],
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const config = await loadEffectiveConfig(cwd, baseOpts);

  logger.debug(
    `Starting reflow (cwd=${cwd}, config=${baseOpts.config ?? "auto"}, width=${config.maxLineWidth}, watch=${baseOpts.watch ? "yes" : "no"})`,
  );

  if (baseOpts.watch) {
    // Watch mode – runs until interrupted
    const handle = watchSources(cwd, {
      config,
      paths: paths.length > 0 ? paths : ["."],
      report: baseOpts.report,
    });
    process.once("SIGINT", () => {
      handle.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(err);
          process.exit(1);
        },
      );
    });
    return;
  }

  // No paths: stdin → stdout
  if (paths.length === 0) {
    const result = formatSource(fs.readFileSync(0, "utf8"), config);
    if (!result.ok) {
      logger.error(result.message);
      process.exitCode = 1;
      return;
    }
    process.stdout.write(result.text);
    return;
  }

  const files = resolveSourceFiles(cwd, paths, config);
  if (files.length === 0) {
    logger.warn("No matching files.");
    return;
  }

  const singleFile =
    paths.length === 1 &&
    files.length === 1 &&
    !fs.statSync(path.resolve(cwd, paths[0])).isDirectory();

  if (singleFile && !baseOpts.write && !baseOpts.check) {
    const result = formatSource(fs.readFileSync(files[0], "utf8"), config);
    if (!result.ok) {
      logger.error(result.message);
      process.exitCode = 1;
      return;
    }
    process.stdout.write(result.text);
    return;
  }

  const summary = formatFiles(files, {
    config,
    write: baseOpts.write,
    report: baseOpts.report,
    cwd,
    logger,
  });

  if (!baseOpts.write) {
    for (const file of summary.files) {
      if (file.status === "changed") {
        logger.info(`Would reformat ${toPosixPath(path.relative(cwd, file.filePath))}`);
      }
    }
  }

  if (summary.failed > 0 || (baseOpts.check && summary.changed > 0)) {
    process.exitCode = 1;
  }
}

async function handleServeCommand(
  cwd: string,
  serveOpts: ServeCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const config = await loadEffectiveConfig(cwd, baseOpts);

  const server = createPrettyServer({
    defaultMaxLineWidth: config.maxLineWidth,
  });
  await listen(server, serveOpts.port, serveOpts.host);
  logger.info(`Listening on http://${serveOpts.host}:${serveOpts.port}`);
}

function handleInitCommand(
  cwd: string,
  initOpts: InitCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const result = initConfig(cwd, { force: initOpts.force });
  if (!result.written) {
    logger.info("Nothing written.");
  }
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("reflow")
    .description("reflow – width-aware source formatter that keeps your comments")
    // global-ish options used by base + serve + init
    .option("-c, --config <path>", "Path to reflow config file")
    .option("--max-line-width <n>", "Maximum line width", parsePositiveInt)
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  // serve subcommand
  program
    .command("serve")
    .description("Serve POST /pretty over HTTP")
    .option("-p, --port <n>", "Port to listen on", parsePositiveInt, 9090)
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .action(async (serveOpts: ServeCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleServeCommand(cwd, serveOpts, baseOpts);
    });

  // init subcommand
  program
    .command("init")
    .description("Write a starter reflow.config.ts")
    .option("--force", "Overwrite an existing config file")
    .action((initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      handleInitCommand(cwd, initOpts, baseOpts);
    });

  // Base command: format files, directories or stdin
  program
    .argument("[paths...]", "Files or directories to format (default: stdin)")
    .option("-w, --write", "Write formatted output back to the files")
    .option("--check", "Exit with code 1 if any file would change")
    .option("--watch", "Re-format files when they change (implies --write)")
    .option("--report", "Warn about comments that may have been misplaced")
    .action(async (paths: string[], opts: BaseCliOptions) => {
      await handleFormatCommand(cwd, paths, opts);
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
