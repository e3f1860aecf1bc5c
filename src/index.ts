export {
  type AggregateOptions,
  type AggregateReport,
  type TaskFailure,
  aggregateCidrs,
} from "./aggregate.js";
export { Channel, ChannelClosedError } from "./channel.js";
export {
  type Address,
  type AddressFamily,
  type CidrNetwork,
  type EnumerateOptions,
  type EnumerationError,
  type EnumerationPlan,
  DEFAULT_ADDRESS_LIMIT,
  enumerateCidr,
  formatAddress,
  maskAddress,
  networkContains,
  networkSize,
  nextAddress,
  parseCidr,
  planEnumeration,
} from "./cidr.js";
export {
  type ErrorKind,
  AddressLimitExceededError,
  Cidr2IpError,
  EmptyInputSourceError,
  InvalidCidrFormatError,
  UnreadableInputSourceError,
  UsageError,
} from "./errors.js";
export { type InputSource, collectCidrs, parseCidrList, readCidrFile } from "./input.js";
export { type LogEntry, type LogLevel, Logger } from "./logger.js";
export { outputFileName, writeAddressCsv } from "./output.js";
export { type Result, err, ok } from "./result.js";
export { type EnumerationJob, enumerateInWorker, jobFor } from "./worker.js";
