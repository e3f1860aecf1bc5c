import { join } from "node:path";
import { aggregateCidrs } from "./aggregate.js";
import { type Environment, helpText, parseCliArgs, versionText } from "./config.js";
import { describeError } from "./errors.js";
import { collectCidrs } from "./input.js";
import { Logger, consoleSubscriber } from "./logger.js";
import { outputFileName, writeAddressCsv } from "./output.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
  env: Environment;
};

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  now: () => new Date(),
  env: process.env,
};

/**
 * Runs the command line and resolves with the exit status: 0 on success, 1
 * when input, enumeration or output fails, 2 on a usage error.
 */
export async function runCli(argv: readonly string[], io: Partial<CliIo> = {}): Promise<number> {
  const { stdout, stderr, now, env } = { ...defaultIo, ...io };
  const parsed = parseCliArgs(argv, env);

  const logger = new Logger();
  const verbose = parsed.ok && parsed.value.verbose;
  logger.subscribe(consoleSubscriber(stderr), { level: verbose ? "debug" : "warn" });

  if (!parsed.ok) {
    logger.error("cli:usage", parsed.error.message);
    stderr("Use -h for help.\n");
    return 2;
  }

  const config = parsed.value;
  if (config.version) {
    stdout(versionText());
    return 0;
  }
  if (config.help) {
    stdout(helpText());
    return 0;
  }

  const input = await collectCidrs({ file: config.file, args: config.cidrs });
  if (!input.ok) {
    logger.error("input:rejected", input.error.message);
    return 1;
  }

  const cidrs = input.value;
  const report = await aggregateCidrs(cidrs, { limit: config.limit, logger });
  const failed = report.failures.length;
  if (failed > 0 && !config.keepPartial) {
    logger.error(
      "run:aborted",
      `aborted: ${failed} of ${cidrs.length} CIDRs could not be expanded; no file written`,
    );
    return 1;
  }

  const file = join(config.outDir, outputFileName(now()));
  try {
    await writeAddressCsv(report.addresses, file);
  } catch (error) {
    logger.error("output:failed", `cannot write ${file}: ${describeError(error)}`);
    return 1;
  }

  logger.info("output:written", `wrote ${report.addresses.length} addresses to ${file}`);
  if (failed > 0) {
    logger.warn("run:partial", `${failed} of ${cidrs.length} CIDRs could not be expanded`);
  }
  stdout(`IP list saved to ${file}\n`);
  return failed > 0 ? 1 : 0;
}
