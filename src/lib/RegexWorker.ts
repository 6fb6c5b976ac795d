/**
 * RegexWorker - Runs caller-supplied regular expressions on a worker thread
 *
 * A pattern can backtrack for far longer than any call timeout. The worker is
 * terminated as soon as the call's signal aborts, so the main thread stays free
 * for the timeout to fire.
 */

import { Worker } from "worker_threads";
import { z } from "zod";
import { abortReason } from "./TimeoutManager";

const WORKER_SOURCE = `
const { parentPort, workerData } = require("worker_threads");
const { source, flags, text, replacement } = workerData;
const regex = new RegExp(source, flags);
if (replacement === null) {
  const matched = [];
  text.split(/\\r\\n|\\r|\\n/).forEach((line, index) => {
    if (regex.test(line)) matched.push(index);
  });
  parentPort.postMessage({ matched });
} else {
  const count = (text.match(regex) || []).length;
  parentPort.postMessage({ count, replaced: text.replace(regex, replacement) });
}
`;

interface RegexJob {
  source: string;
  flags: string;
  text: string;
  replacement: string | null;
}

const matchResult = z.object({ matched: z.array(z.number().int()) });
const replaceResult = z.object({ count: z.number().int(), replaced: z.string() });

function runJob(job: RegexJob, signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const worker = new Worker(WORKER_SOURCE, { eval: true, workerData: job });
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      signal.removeEventListener("abort", onAbort);
      settle();
      worker.terminate().catch((error: unknown) => {
        console.error("[RegexWorker] Failed to terminate worker:", error);
      });
    };
    const onAbort = () => finish(() => reject(abortReason(signal)));

    signal.addEventListener("abort", onAbort, { once: true });
    worker.once("message", (message: unknown) => finish(() => resolve(message)));
    worker.once("error", (error: Error) => finish(() => reject(error)));
    worker.once("exit", (code: number) =>
      finish(() =>
        reject(new Error(`Regular expression worker exited with code ${code}`))
      )
    );
  });
}

/**
 * Zero-based indexes of the lines that match the pattern
 */
export async function matchLines(
  pattern: string,
  text: string,
  signal: AbortSignal
): Promise<number[]> {
  const result = await runJob(
    { source: pattern, flags: "", text, replacement: null },
    signal
  );
  return matchResult.parse(result).matched;
}

/**
 * Replace every match of the pattern; the replacement may use group references
 */
export async function replaceMatches(
  pattern: string,
  text: string,
  replacement: string,
  signal: AbortSignal
): Promise<{ count: number; replaced: string }> {
  const result = await runJob(
    { source: pattern, flags: "g", text, replacement },
    signal
  );
  return replaceResult.parse(result);
}
