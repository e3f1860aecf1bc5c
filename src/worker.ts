import { Worker } from "node:worker_threads";
import type { EnumerationPlan } from "./cidr.js";

export type EnumerationJob = {
  family: "ipv4" | "ipv6";
  bytes: number[];
  count: number;
};

type WorkerReply = { addresses: string[] } | { error: string };

// Runs as CommonJS inside the worker, so it cannot import ./cidr.js.
// It must format addresses exactly as formatAddress does.
export const enumerationScript = `
  const { parentPort, workerData } = require("node:worker_threads");

  const increment = (bytes) => {
    for (let i = bytes.length - 1; i >= 0; i -= 1) {
      bytes[i] = (bytes[i] + 1) & 0xff;
      if (bytes[i] !== 0) return;
    }
  };

  const formatIPv4 = (bytes) => bytes.join(".");

  const formatIPv6 = (bytes) => {
    if (bytes.slice(0, 10).every((byte) => byte === 0) && bytes[10] === 0xff && bytes[11] === 0xff) {
      return bytes.slice(12).join(".");
    }
    const hextets = [];
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
      while (end < hextets.length && hextets[end] === 0) end += 1;
      if (end - i > runLength) {
        runStart = i;
        runLength = end - i;
      }
      i = end;
    }
    const join = (values) => values.map((value) => value.toString(16)).join(":");
    if (runLength < 2) return join(hextets);
    return join(hextets.slice(0, runStart)) + "::" + join(hextets.slice(runStart + runLength));
  };

  try {
    const { family, bytes, count } = workerData;
    const format = family === "ipv4" ? formatIPv4 : formatIPv6;
    const cursor = bytes.slice();
    const addresses = new Array(count);
    for (let i = 0; i < count; i += 1) {
      addresses[i] = format(cursor);
      increment(cursor);
    }
    parentPort.postMessage({ addresses });
  } catch (error) {
    parentPort.postMessage({ error: error instanceof Error ? error.message : String(error) });
  }
`;

export function jobFor(plan: EnumerationPlan): EnumerationJob {
  const { base } = plan.network;
  return { family: base.family, bytes: [...base.bytes], count: plan.count };
}

/**
 * Enumerates a planned block on a worker thread. The worker is terminated
 * once it has replied, failed or exited.
 */
export async function enumerateInWorker(job: EnumerationJob): Promise<string[]> {
  const worker = new Worker(enumerationScript, { eval: true, workerData: job });
  try {
    return await nextReply(worker);
  } finally {
    await worker.terminate();
  }
}

function nextReply(worker: Worker): Promise<string[]> {
  return new Promise((resolve, reject) => {
    worker.once("message", (reply: WorkerReply) => {
      if ("error" in reply) {
        reject(new Error(`enumeration worker failed: ${reply.error}`));
      } else {
        resolve(reply.addresses);
      }
    });
    worker.once("error", reject);
    worker.once("exit", (code: number) => {
      reject(new Error(`enumeration worker exited with code ${code} before replying`));
    });
  });
}
