import { mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Result, enumerateCidr } from "../src/index.js";

export type FixtureCase = {
  cidr: string;
  count: number;
  first: string;
  last: string;
};

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`expected ok result, got ${String(result.error)}`);
  }
  return result.value;
}

export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error("expected error result");
  }
  return result.error;
}

export function expand(cidr: string): string[] {
  return unwrap(enumerateCidr(cidr));
}

export function ipv4ToNumber(address: string): number {
  return address.split(".").reduce((value, octet) => value * 256 + Number(octet), 0);
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "cidr2ip-test-"));
}

export async function readLines(path: string): Promise<string[]> {
  const text = await readFile(path, "utf8");
  return text.length === 0 ? [] : text.replace(/\n$/, "").split("\n");
}
