// demo/loadgen.ts
import { GuardedHttpClient } from "../src/client.js";
import { breakerConfigFromEnv } from "../src/config.js";
import { OpenCircuitError, RequestTimeoutError, TransportError } from "../src/errors.js";
import type { TransitionEvent } from "../src/events.js";
import { LoggingListener } from "../src/listeners.js";

const UPSTREAM = process.env.UPSTREAM ?? "http://127.0.0.1:3001";
const TOTAL = Number(process.env.TOTAL ?? 500);
const CONCURRENCY = Number(process.env.CONCURRENCY ?? 20);

const client = new GuardedHttpClient({
  requestTimeoutMs: Number(process.env.REQUEST_TIMEOUT_MS ?? 120),
  // Short window so an open circuit closes within the demo once traffic stops counting
  breaker: breakerConfigFromEnv({ TRIPWIRE_WINDOW_MS: "1000", ...process.env }),
  listeners: [new LoggingListener(console)],
});

type Counters = Record<string, number>;
const c: Counters = {
  ok: 0,
  http5xx: 0,
  timeout: 0,
  transport: 0,
  circuitOpen: 0,
  otherErr: 0,
};

client.on("breaker:transition", (e: TransitionEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[breaker] ${e.identity} ${e.previousStatus} -> ${e.newStatus}`);
});

function classifyErr(err: unknown): keyof Counters {
  if (err instanceof OpenCircuitError) return "circuitOpen";
  if (err instanceof RequestTimeoutError) return "timeout";
  if (err instanceof TransportError) return "transport";
  return "otherErr";
}

function done(): number {
  return Object.values(c).reduce((a, b) => a + b, 0);
}

async function worker(jobs: number[]) {
  for (const _ of jobs) {
    try {
      const resp = await client.request({ method: "GET", url: `${UPSTREAM}/flaky` });
      if (resp.status >= 500) c.http5xx++;
      else c.ok++;
    } catch (err) {
      const k = classifyErr(err);
      c[k]++;
    }

    if (done() % 50 === 0) {
      const snap = client.breaker.snapshot(client.identify({ method: "GET", url: `${UPSTREAM}/flaky` }));
      // eslint-disable-next-line no-console
      console.log(
        `[snap] status=${snap.status} failureRatio=${snap.failureRatio}% ok=${c.ok} 5xx=${c.http5xx} to=${c.timeout} co=${c.circuitOpen}`
      );
    }
  }
}

function chunkIndices(total: number, workers: number): number[][] {
  const chunks: number[][] = Array.from({ length: workers }, () => []);
  for (let i = 0; i < total; i++) chunks[i % workers].push(i);
  return chunks;
}

async function main() {
  // eslint-disable-next-line no-console
  console.log(`[loadgen] upstream=${UPSTREAM} total=${TOTAL} concurrency=${CONCURRENCY}`);

  const chunks = chunkIndices(TOTAL, CONCURRENCY);
  await Promise.all(chunks.map((jobs) => worker(jobs)));

  // eslint-disable-next-line no-console
  console.log(`[done]`, c);
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
