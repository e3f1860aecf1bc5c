import { parseArgs } from "node:util";
import { DEFAULT_ADDRESS_LIMIT } from "./cidr.js";
import { UsageError, describeError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export const APP_NAME = "cidr2ip";
export const APP_VERSION = "1.0.0";

export const OUT_DIR_ENV = "CIDR2IP_OUT_DIR";

export type Environment = Readonly<Record<string, string | undefined>>;

export type CliConfig = {
  help: boolean;
  version: boolean;
  file?: string;
  cidrs: string[];
  outDir: string;
  limit: number;
  keepPartial: boolean;
  verbose: boolean;
};

const POSITIVE_INTEGER = /^[1-9][0-9]*$/;

export function parseCliArgs(
  argv: readonly string[],
  env: Environment = {},
): Result<CliConfig, UsageError> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return err(new UsageError(describeError(error)));
  }

  const { values, positionals } = parsed;

  let limit = DEFAULT_ADDRESS_LIMIT;
  if (values.limit !== undefined) {
    const candidate = Number(values.limit);
    if (!POSITIVE_INTEGER.test(values.limit) || !Number.isSafeInteger(candidate)) {
      return err(new UsageError(`invalid --limit value: ${values.limit}`));
    }
    limit = candidate;
  }

  return ok({
    help: values.help ?? false,
    version: values.version ?? false,
    file: values.file === "" ? undefined : values.file,
    cidrs: positionals,
    outDir: values["out-dir"] ?? env[OUT_DIR_ENV] ?? ".",
    limit,
    keepPartial: values["keep-partial"] ?? false,
    verbose: values.verbose ?? false,
  });
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      file: { type: "string", short: "f" },
      "out-dir": { type: "string", short: "o" },
      limit: { type: "string" },
      "keep-partial": { type: "boolean" },
      verbose: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
  });
}

export function helpText(): string {
  return [
    `Usage: ${APP_NAME} [-f filename] <CIDR1 CIDR2 ...>`,
    "Options:",
    "  -f, --file <filename>  Read CIDRs from a file, one per line",
    `  -o, --out-dir <dir>    Directory for the CSV file (default: $${OUT_DIR_ENV} or .)`,
    `      --limit <count>    Largest block to expand (default: ${DEFAULT_ADDRESS_LIMIT})`,
    "      --keep-partial     Write the valid blocks even when some CIDRs fail",
    "      --verbose          Log every enumeration task",
    "  -h, --help             Show help menu",
    "  -v, --version          Show version",
    "",
  ].join("\n");
}

export function versionText(): string {
  return `${APP_NAME} version ${APP_VERSION}\n`;
}
