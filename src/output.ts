import { APP_NAME } from "./config.js";
import { writeCsv } from "./csv.js";

export async function writeAddressCsv(addresses: readonly string[], path: string): Promise<void> {
  await writeCsv(path, singleFieldRows(addresses));
}

/**
 * Timestamped file name in local time, e.g. `cidr2ip_2024-01-02_03-04-05.csv`.
 */
export function outputFileName(date: Date, app: string = APP_NAME): string {
  const day = [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join("-");
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join("-");
  return `${app}_${day}_${time}.csv`;
}

function* singleFieldRows(values: readonly string[]): Generator<readonly string[]> {
  for (const value of values) {
    yield [value];
  }
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
