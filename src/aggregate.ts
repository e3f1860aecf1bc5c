import { setImmediate as nextTurn } from "node:timers/promises";
import { Channel } from "./channel.js";
import { type EnumerationError, planEnumeration } from "./cidr.js";
import type { Logger } from "./logger.js";
import { enumerateInWorker, jobFor } from "./worker.js";

export type TaskFailure = {
  readonly index: number;
  readonly cidr: string;
  readonly error: EnumerationError;
};

export type AggregateReport = {
  /** Every delivered address list, concatenated in delivery order. */
  readonly addresses: string[];
  /** Failed inputs, in input order. */
  readonly failures: TaskFailure[];
  /** CIDRs whose lists were delivered, in delivery order. */
  readonly completed: string[];
};

export type AggregateOptions = {
  limit?: number;
  logger?: Logger;
  onFailure?: (failure: TaskFailure) => void;
};

type Delivery = {
  cidr: string;
  addresses: string[];
};

/**
 * Enumerates every CIDR in its own task, each on a worker thread, and collects
 * the lists through a bounded channel. A failing task is reported as it fails
 * and does not stop its siblings.
 */
export async function aggregateCidrs(
  cidrs: readonly string[],
  options: AggregateOptions = {},
): Promise<AggregateReport> {
  const channel = new Channel<Delivery>(Math.max(cidrs.length, 1));
  const tasks = cidrs.map((cidr, index) => runTask(cidr, index, channel, options));

  const supervisor = Promise.allSettled(tasks).then((outcomes) => {
    channel.close();
    return outcomes;
  });

  const addresses: string[] = [];
  const completed: string[] = [];
  for await (const delivery of channel) {
    // spreading a /8 into push() would overflow the call stack
    for (const address of delivery.addresses) {
      addresses.push(address);
    }
    completed.push(delivery.cidr);
  }

  const failures: TaskFailure[] = [];
  for (const outcome of await supervisor) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    if (outcome.value !== null) {
      failures.push(outcome.value);
    }
  }

  return { addresses, failures, completed };
}

async function runTask(
  cidr: string,
  index: number,
  channel: Channel<Delivery>,
  options: AggregateOptions,
): Promise<TaskFailure | null> {
  await nextTurn();
  options.logger?.debug("task:start", `enumerating ${cidr}`, { index });

  const plan = planEnumeration(cidr, { limit: options.limit });
  if (!plan.ok) {
    const failure: TaskFailure = { index, cidr, error: plan.error };
    options.logger?.error("task:failed", plan.error.message, { index, cidr });
    options.onFailure?.(failure);
    return failure;
  }

  const addresses = await enumerateInWorker(jobFor(plan.value));
  await channel.send({ cidr, addresses });
  options.logger?.debug("task:done", `${cidr}: ${addresses.length} addresses`, { index });
  return null;
}
