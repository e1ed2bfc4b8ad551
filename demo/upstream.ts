// demo/upstream.ts
import http from "node:http";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// Healthy for HEALTHY_MS, then answering 500 for OUTAGE_MS, repeating
const HEALTHY_MS = Number(process.env.HEALTHY_MS ?? 3000);
const OUTAGE_MS = Number(process.env.OUTAGE_MS ?? 2000);
const startedAt = Date.now();

function inOutage(): boolean {
  return (Date.now() - startedAt) % (HEALTHY_MS + OUTAGE_MS) >= HEALTHY_MS;
}

const server = http.createServer((_req, res) => {
  res.statusCode = inOutage() ? 500 : 200;
  res.end(res.statusCode === 200 ? "ok" : "outage");
});

server.listen(PORT, "127.0.0.1", () => {
  // eslint-disable-next-line no-console
  console.log(`[upstream] listening on http://127.0.0.1:${PORT} (HEALTHY_MS=${HEALTHY_MS}, OUTAGE_MS=${OUTAGE_MS})`);
});
