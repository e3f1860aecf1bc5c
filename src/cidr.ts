import {
  AddressLimitExceededError,
  InvalidCidrFormatError,
} from "./errors.js";
import { type Result, err, ok } from "./result.js";

export type AddressFamily = "ipv4" | "ipv6";

export type Address = {
  readonly family: AddressFamily;
  readonly bytes: readonly number[];
};

export type CidrNetwork = {
  readonly cidr: string;
  readonly family: AddressFamily;
  readonly prefix: number;
  readonly mask: readonly number[];
  readonly base: Address;
};

export type EnumerateOptions = {
  limit?: number;
};

export type EnumerationError = InvalidCidrFormatError | AddressLimitExceededError;

export const DEFAULT_ADDRESS_LIMIT = 2 ** 24;

const IPV4_BYTES = 4;
const IPV6_BYTES = 16;

const DECIMAL_BYTE = /^(?:0|[1-9][0-9]{0,2})$/;
const DIGITS = /^[0-9]+$/;
const HEXTET = /^[0-9a-f]{1,4}$/;

export type EnumerationPlan = {
  readonly network: CidrNetwork;
  readonly count: number;
};

/**
 * Parses `cidr` and checks its size against the address limit without
 * enumerating it.
 */
export function planEnumeration(
  cidr: string,
  options: EnumerateOptions = {},
): Result<EnumerationPlan, EnumerationError> {
  const parsed = parseCidr(cidr);
  if (!parsed.ok) {
    return parsed;
  }

  const network = parsed.value;
  const limit = options.limit ?? DEFAULT_ADDRESS_LIMIT;
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw new RangeError(`Address limit must be a positive integer, got ${limit}`);
  }

  const size = networkSize(network);
  if (size > BigInt(limit)) {
    return err(new AddressLimitExceededError(network.cidr, size, limit));
  }
  return ok({ network, count: Number(size) });
}

/**
 * Expands a CIDR expression into every address it contains, from the network
 * address through the broadcast address.
 */
export function enumerateCidr(
  cidr: string,
  options: EnumerateOptions = {},
): Result<string[], EnumerationError> {
  const plan = planEnumeration(cidr, options);
  if (!plan.ok) {
    return plan;
  }

  const { network } = plan.value;
  const addresses: string[] = [];
  let cursor = network.base;
  do {
    addresses.push(formatAddress(cursor));
    cursor = nextAddress(cursor);
  } while (networkContains(network, cursor) && !sameAddress(cursor, network.base));

  return ok(addresses);
}

export function parseCidr(input: string): Result<CidrNetwork, InvalidCidrFormatError> {
  const trimmed = input.trim();
  const parts = trimmed.split("/");
  if (parts.length !== 2) {
    return err(new InvalidCidrFormatError(input));
  }

  const [addressText, prefixText] = parts;
  // leading zeros are allowed in the prefix length, not in the octets
  if (!addressText || !DIGITS.test(prefixText)) {
    return err(new InvalidCidrFormatError(input));
  }

  const bytes = addressText.includes(":") ? parseIPv6(addressText) : parseIPv4(addressText);
  if (bytes === null) {
    return err(new InvalidCidrFormatError(input));
  }

  const prefix = Number.parseInt(prefixText, 10);
  if (prefix > bytes.length * 8) {
    return err(new InvalidCidrFormatError(input));
  }

  const family: AddressFamily = bytes.length === IPV4_BYTES ? "ipv4" : "ipv6";
  const mask = prefixMask(prefix, bytes.length);
  return ok({
    cidr: trimmed,
    family,
    prefix,
    mask,
    base: maskAddress({ family, bytes }, mask),
  });
}

/**
 * Returns the address one above `address`, carrying from the last byte
 * upwards. The all-ones address wraps to all zeros.
 */
export function nextAddress(address: Address): Address {
  const bytes = address.bytes.slice();
  for (let i = bytes.length - 1; i >= 0; i -= 1) {
    bytes[i] = (bytes[i] + 1) & 0xff;
    if (bytes[i] !== 0) {
      break;
    }
  }
  return { family: address.family, bytes };
}

export function maskAddress(address: Address, mask: readonly number[]): Address {
  return {
    family: address.family,
    bytes: address.bytes.map((byte, i) => byte & mask[i]),
  };
}

export function networkContains(network: CidrNetwork, address: Address): boolean {
  if (address.family !== network.family) {
    return false;
  }
  return sameAddress(maskAddress(address, network.mask), network.base);
}

export function networkSize(network: CidrNetwork): bigint {
  return 1n << BigInt(network.mask.length * 8 - network.prefix);
}

export function formatAddress(address: Address): string {
  if (address.family === "ipv4") {
    return address.bytes.join(".");
  }
  return formatIPv6(address.bytes);
}

function sameAddress(left: Address, right: Address): boolean {
  return (
    left.family === right.family &&
    left.bytes.length === right.bytes.length &&
    left.bytes.every((byte, i) => byte === right.bytes[i])
  );
}

function prefixMask(prefix: number, width: number): number[] {
  const mask: number[] = [];
  for (let i = 0; i < width; i += 1) {
    const bits = Math.min(Math.max(prefix - i * 8, 0), 8);
    mask.push((0xff << (8 - bits)) & 0xff);
  }
  return mask;
}

function parseIPv4(text: string): number[] | null {
  const parts = text.split(".");
  if (parts.length !== IPV4_BYTES) {
    return null;
  }

  const octets: number[] = [];
  for (const part of parts) {
    if (!DECIMAL_BYTE.test(part)) {
      return null;
    }
    const octet = Number.parseInt(part, 10);
    if (octet > 255) {
      return null;
    }
    octets.push(octet);
  }

  return octets;
}

function parseIPv6(text: string): number[] | null {
  let normalized = text.toLowerCase();
  normalized = expandEmbeddedIPv4(normalized);
  if (normalized.length === 0) {
    return null;
  }

  const doubleColonCount = (normalized.match(/::/g) ?? []).length;
  if (doubleColonCount > 1) {
    return null;
  }

  const hasCompression = normalized.includes("::");
  const [leftRaw, rightRaw = ""] = hasCompression ? normalized.split("::") : [normalized, ""];
  const leftParts = leftRaw.length === 0 ? [] : leftRaw.split(":");
  const rightParts = hasCompression && rightRaw.length > 0 ? rightRaw.split(":") : [];

  if (leftParts.some((part) => part.length === 0) || rightParts.some((part) => part.length === 0)) {
    return null;
  }

  const parsedLeft = parseHextetParts(leftParts);
  const parsedRight = parseHextetParts(rightParts);
  if (parsedLeft === null || parsedRight === null) {
    return null;
  }

  let hextets: number[];
  if (hasCompression) {
    const fixedCount = parsedLeft.length + parsedRight.length;
    if (fixedCount >= 8) {
      return null;
    }
    hextets = [...parsedLeft, ...Array<number>(8 - fixedCount).fill(0), ...parsedRight];
  } else {
    if (parsedLeft.length !== 8) {
      return null;
    }
    hextets = parsedLeft;
  }

  const bytes: number[] = [];
  for (const hextet of hextets) {
    bytes.push(hextet >> 8, hextet & 0xff);
  }
  return bytes.length === IPV6_BYTES ? bytes : null;
}

function expandEmbeddedIPv4(text: string): string {
  if (!text.includes(".")) {
    return text;
  }

  const lastColon = text.lastIndexOf(":");
  if (lastColon < 0) {
    return "";
  }

  const ipv4Part = text.slice(lastColon + 1);
  if (!ipv4Part) {
    return "";
  }

  const octets = parseIPv4(ipv4Part);
  if (octets === null) {
    return "";
  }

  const high = ((octets[0] << 8) | octets[1]).toString(16);
  const low = ((octets[2] << 8) | octets[3]).toString(16);
  return `${text.slice(0, lastColon)}:${high}:${low}`;
}

function parseHextetParts(parts: string[]): number[] | null {
  const out: number[] = [];
  for (const part of parts) {
    if (!HEXTET.test(part)) {
      return null;
    }
    out.push(Number.parseInt(part, 16));
  }
  return out;
}

function formatIPv6(bytes: readonly number[]): string {
  if (isIPv4Mapped(bytes)) {
    return bytes.slice(12).join(".");
  }

  const hextets: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    hextets.push((bytes[i] << 8) | bytes[i + 1]);
  }

  let runStart = -1;
  let runLength = 0;
  for (let i = 0; i < hextets.length; ) {
    if (hextets[i] !== 0) {
      i += 1;
      continue;
    }
    let end = i;
    while (end < hextets.length && hextets[end] === 0) {
      end += 1;
    }
    if (end - i > runLength) {
      runStart = i;
      runLength = end - i;
    }
    i = end;
  }

  const join = (values: number[]) => values.map((value) => value.toString(16)).join(":");
  // a single zero group is written out, not compressed
  if (runLength < 2) {
    return join(hextets);
  }
  return `${join(hextets.slice(0, runStart))}::${join(hextets.slice(runStart + runLength))}`;
}

function isIPv4Mapped(bytes: readonly number[]): boolean {
  return (
    bytes.slice(0, 10).every((byte) => byte === 0) && bytes[10] === 0xff && bytes[11] === 0xff
  );
}
