export type ErrorKind =
  | "InvalidCIDRFormat"
  | "AddressLimitExceeded"
  | "EmptyInputSource"
  | "UnreadableInputSource"
  | "Usage";

export abstract class Cidr2IpError extends Error {
  abstract readonly kind: ErrorKind;
}

export class InvalidCidrFormatError extends Cidr2IpError {
  readonly kind = "InvalidCIDRFormat";

  constructor(readonly cidr: string) {
    super(`invalid CIDR address: ${cidr}`);
    this.name = "InvalidCidrFormatError";
  }
}

export class AddressLimitExceededError extends Cidr2IpError {
  readonly kind = "AddressLimitExceeded";

  constructor(
    readonly cidr: string,
    readonly size: bigint,
    readonly limit: number,
  ) {
    super(`${cidr} expands to ${size} addresses, more than the limit of ${limit}`);
    this.name = "AddressLimitExceededError";
  }
}

export class EmptyInputSourceError extends Cidr2IpError {
  readonly kind = "EmptyInputSource";

  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message);
    this.name = "EmptyInputSourceError";
  }
}

export class UnreadableInputSourceError extends Cidr2IpError {
  readonly kind = "UnreadableInputSource";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`cannot read ${path}: ${describeError(cause)}`, { cause });
    this.name = "UnreadableInputSourceError";
  }
}

export class UsageError extends Cidr2IpError {
  readonly kind = "Usage";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
