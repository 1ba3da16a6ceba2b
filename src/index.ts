#!/usr/bin/env node

import { Command } from "commander";
import { resolve } from "node:path";
import { ConfigError, loadConfig } from "./lib/config.js";
import { createStageContext, type StageContext } from "./lib/context.js";
import { PathNotFoundError, errorMessage } from "./lib/errors.js";
import { createConsoleLogSink, createFileLogSink, createLogger, type LogSink } from "./lib/log.js";
import { CLI_NAME, PRODUCT_NAME } from "./lib/branding.js";
import { renderResult } from "./lib/report.js";
import type { BuilderConfig } from "./types/config.js";
import type { OperationResult } from "./types/result.js";

interface GlobalOptions {
  config?: string;
  logFile?: string;
  json?: boolean;
}

const EXIT_FAILED = 1;
const EXIT_FATAL = 2;

const program = new Command();

program
  .name(CLI_NAME)
  .description(`${PRODUCT_NAME}: builds and verifies portable NVDA images with the AT Automation add-on`)
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file")
  .option("--log-file <path>", "Append the run log to this file")
  .option("--json", "Print results as JSON");

/**
 * Loads config, wires a stage context and runs one entry point.
 *
 * Exit codes: 0 success, 1 failed result, 2 bad config or missing input.
 */
async function execute(run: (ctx: StageContext) => Promise<OperationResult>): Promise<void> {
  const globals = program.opts<GlobalOptions>();

  let config: BuilderConfig;
  try {
    config = await loadConfig(globals.config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(EXIT_FATAL);
    }
    throw error;
  }

  const sinks: LogSink[] = [createFileLogSink(resolve(globals.logFile ?? config.log.file))];
  if (!globals.json) {
    sinks.push(createConsoleLogSink());
  }
  const ctx = createStageContext(config, createLogger(sinks));

  let result: OperationResult;
  try {
    result = await run(ctx);
  } catch (error) {
    if (error instanceof PathNotFoundError) {
      ctx.logger.error(error.message);
      if (globals.json) {
        console.error(error.message);
      }
      process.exit(EXIT_FATAL);
    }
    throw error;
  }

  console.log(renderResult(result, globals.json ?? false));
  if (!result.success) {
    process.exitCode = EXIT_FAILED;
  }
}

program
  .command("resolve")
  .description("Resolve the NVDA version and installer URL")
  .argument("[version]", "Version to use instead of the latest stable release")
  .action(async (version: string | undefined) => {
    const { resolveCommand } = await import("./commands/resolve.js");
    await execute((ctx) => resolveCommand(version, ctx));
  });

program
  .command("download")
  .description("Download the NVDA installer")
  .argument("<url>", "Installer URL")
  .option("-o, --output <file>", "Destination file", "nvda_installer.exe")
  .action(async (url: string, options: { output: string }) => {
    const { downloadCommand } = await import("./commands/download.js");
    await execute((ctx) => downloadCommand(url, ctx, options.output));
  });

program
  .command("install")
  .description("Install NVDA from an installer")
  .argument("<installer>", "Path to the NVDA installer")
  .action(async (installer: string) => {
    const { installCommand } = await import("./commands/install.js");
    await execute((ctx) => installCommand(installer, ctx));
  });

program
  .command("fetch-plugin")
  .description("Clone the AT Automation add-on sources")
  .option("-o, --output <dir>", "Destination directory (default: ./NVDAPlugin)")
  .action(async (options: { output?: string }) => {
    const { fetchPluginCommand } = await import("./commands/fetch-plugin.js");
    await execute((ctx) => fetchPluginCommand(ctx, options.output));
  });

program
  .command("install-addon")
  .description("Install the AT Automation add-on")
  .argument("<addon>", "Add-on directory or .nvda-addon archive")
  .option("--image <dir>", "Install into this portable image instead of the user configuration")
  .action(async (addon: string, options: { image?: string }) => {
    const { installAddonCommand } = await import("./commands/install-addon.js");
    await execute((ctx) => installAddonCommand(addon, ctx, { image: options.image }));
  });

program
  .command("configure")
  .description("Disable update checks and select the capture-speech synthesizer")
  .option("--config-dir <dir>", "NVDA configuration directory")
  .action(async (options: { configDir?: string }) => {
    const { configureCommand } = await import("./commands/configure.js");
    await execute((ctx) => configureCommand(ctx, { configDir: options.configDir }));
  });

program
  .command("create-portable")
  .description("Create a portable image from the installed NVDA")
  .argument("<version>", "Version recorded in the image")
  .option("-o, --output <dir>", "Image directory (default: nvda_<version>_portable)")
  .action(async (version: string, options: { output?: string }) => {
    const { createPortableCommand } = await import("./commands/create-portable.js");
    await execute((ctx) => createPortableCommand(version, ctx, { outputDir: options.output }));
  });

program
  .command("verify-image")
  .description("Check that a directory is a complete portable image")
  .argument("<path>", "Portable image directory")
  .action(async (path: string) => {
    const { verifyImageCommand } = await import("./commands/verify-image.js");
    await execute((ctx) => verifyImageCommand(path, ctx));
  });

program
  .command("test")
  .description("Launch a portable image and wait for the automation endpoint")
  .argument("<path>", "Portable image directory")
  .action(async (path: string) => {
    const { testCommand } = await import("./commands/test.js");
    await execute((ctx) => testCommand(path, ctx));
  });

program
  .command("build")
  .description("Resolve, download, install, configure, export and test in one run")
  .option("--addon <path>", "Add-on directory or .nvda-addon archive (default: fetch from the plugin repository)")
  .option("--nvda-version <version>", "Version to package (default: latest stable)")
  .option("--installer <path>", "Use a local installer instead of downloading")
  .option("-o, --output <dir>", "Image directory (default: nvda_<version>_portable)")
  .option("--skip-test", "Do not launch the image")
  .option("--result-file <path>", "Build record file", "build-result.json")
  .action(
    async (options: {
      addon?: string;
      nvdaVersion?: string;
      installer?: string;
      output?: string;
      skipTest?: boolean;
      resultFile: string;
    }) => {
      const { buildCommand } = await import("./commands/build.js");
      await execute((ctx) =>
        buildCommand(
          {
            addon: options.addon,
            version: options.nvdaVersion,
            installer: options.installer,
            output: options.output,
            skipTest: options.skipTest,
            resultFile: options.resultFile,
          },
          ctx
        )
      );
    }
  );

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_FAILED);
});
