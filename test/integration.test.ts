// test/integration.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MockAgent } from "undici";
import { GuardedHttpClient } from "../src/client.js";
import { OpenCircuitError, RequestTimeoutError } from "../src/errors.js";
import { LoggingListener } from "../src/listeners.js";

describe("integration", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("performs a basic GET successfully", async () => {
    agent.get("https://svc.test").intercept({ path: "/hello", method: "GET" }).reply(200, "ok");

    const client = new GuardedHttpClient({ dispatcher: agent, requestTimeoutMs: 500 });
    const resp = await client.request({ method: "GET", url: "https://svc.test/hello" });

    expect(resp.status).toBe(200);
    expect(new TextDecoder().decode(resp.body)).toBe("ok");
    expect(client.breaker.snapshot("svc.test")).toMatchObject({ status: "CLOSED", successes: 1, failures: 0 });
  });

  it("counts a timeout against the service", async () => {
    agent.get("https://svc.test").intercept({ path: "/slow", method: "GET" }).reply(200, "late").delay(200);

    const client = new GuardedHttpClient({ dispatcher: agent, requestTimeoutMs: 20 });
    await expect(client.request({ method: "GET", url: "https://svc.test/slow" })).rejects.toBeInstanceOf(
      RequestTimeoutError
    );
    expect(client.breaker.stats("svc.test").failures).toBe(1);
  });

  it("trips on an unhealthy upstream and stops calling it", async () => {
    agent.get("https://svc.test").intercept({ path: "/flaky", method: "GET" }).reply(503, "down").times(3);

    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const client = new GuardedHttpClient({
      dispatcher: agent,
      requestTimeoutMs: 500,
      listeners: [new LoggingListener(logger)],
    });

    for (let i = 0; i < 3; i++) {
      const resp = await client.request({ method: "GET", url: "https://svc.test/flaky" });
      expect(resp.status).toBe(503);
    }

    await expect(client.request({ method: "GET", url: "https://svc.test/flaky" })).rejects.toBeInstanceOf(
      OpenCircuitError
    );
    agent.assertNoPendingInterceptors();

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("Request to service `svc.test` was rejected by a tripped breaker.", {
      identity: "svc.test",
      request: "GET https://svc.test/flaky",
      stats: { successes: 0, failures: 3, rejections: 0 },
    });
  });
});
