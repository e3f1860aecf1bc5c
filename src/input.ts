import { readFile } from "node:fs/promises";
import { EmptyInputSourceError, UnreadableInputSourceError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export type InputSource = {
  file?: string;
  args: readonly string[];
};

export type InputError = EmptyInputSourceError | UnreadableInputSourceError;

/**
 * Resolves the CIDRs to expand. A file, when given, takes precedence over
 * positional arguments.
 */
export async function collectCidrs(source: InputSource): Promise<Result<string[], InputError>> {
  if (source.file !== undefined) {
    return readCidrFile(source.file);
  }

  const cidrs = source.args.filter((arg) => arg.trim().length > 0);
  if (cidrs.length === 0) {
    return err(new EmptyInputSourceError("No CIDRs provided. Use -h for help."));
  }
  return ok(cidrs);
}

export async function readCidrFile(path: string): Promise<Result<string[], InputError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    return err(new UnreadableInputSourceError(path, error));
  }

  const cidrs = parseCidrList(text);
  if (cidrs.length === 0) {
    return err(new EmptyInputSourceError(`empty file: ${path}`, path));
  }
  return ok(cidrs);
}

export function parseCidrList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
