// test/classifiers.test.ts
import { describe, expect, it } from "vitest";
import { OpenCircuitError, RequestTimeoutError, TransportError } from "../src/errors.js";
import { EndpointIdentityClassifier, HostIdentityClassifier, toIdentityClassifier } from "../src/identity.js";
import { StandardOutcomeClassifier } from "../src/outcome.js";

const res = (status: number) => ({ status, headers: {}, body: new Uint8Array() });

describe("identity classifiers", () => {
  it("groups by host, keeping an explicit port", () => {
    const c = new HostIdentityClassifier();
    expect(c.identify({ method: "GET", url: "https://api.example.com:8443/v1/users?x=1" })).toBe(
      "api.example.com:8443"
    );
    expect(c.identify({ method: "POST", url: "http://api.example.com/other" })).toBe("api.example.com");
  });

  it("groups by method, scheme, host and trimmed path", () => {
    const c = new EndpointIdentityClassifier();
    expect(c.identify({ method: "GET", url: "https://svc/x" })).toBe("GET https://svc/x");
    expect(c.identify({ method: "POST", url: "https://api.example.com/v1/users/?page=2" })).toBe(
      "POST https://api.example.com/v1/users"
    );
    expect(c.identify({ method: "GET", url: "https://svc" })).toBe("GET https://svc/");
  });

  it("accepts a plain function", () => {
    const c = toIdentityClassifier((req) => req.url.length.toString());
    expect(c.identify({ method: "GET", url: "https://a" })).toBe("9");
  });
});

describe("StandardOutcomeClassifier", () => {
  const c = new StandardOutcomeClassifier();

  it("counts 5xx responses only", () => {
    expect(c.isResponseFailure(res(500), "svc")).toBe(true);
    expect(c.isResponseFailure(res(599), "svc")).toBe(true);
    expect(c.isResponseFailure(res(499), "svc")).toBe(false);
    expect(c.isResponseFailure(res(200), "svc")).toBe(false);
    expect(c.isResponseFailure(res(600), "svc")).toBe(false);
  });

  it("counts transport errors only", () => {
    expect(c.isErrorFailure(new TransportError("reset"), "svc")).toBe(true);
    expect(c.isErrorFailure(new RequestTimeoutError(50), "svc")).toBe(true);
    expect(c.isErrorFailure(new Error("bug"), "svc")).toBe(false);
    expect(c.isErrorFailure(new OpenCircuitError("svc", { method: "GET", url: "https://svc" }), "svc")).toBe(false);
    expect(c.isErrorFailure("nope", "svc")).toBe(false);
  });
});
