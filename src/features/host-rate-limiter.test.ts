import { describe, expect, it } from "vitest";
import { HostRateLimiter } from "./host-rate-limiter";

describe("HostRateLimiter", () => {
  it("lets the first request for a host through at once", async () => {
    const limiter = new HostRateLimiter(1000);
    const t0 = Date.now();
    await limiter.acquire("www.findaphd.com");
    expect(Date.now() - t0).toBeLessThan(200);
  });

  it("spaces consecutive requests to the same host", async () => {
    const limiter = new HostRateLimiter(50);
    const t0 = Date.now();
    await Promise.all([1, 2, 3].map(() => limiter.acquire("example.org")));
    expect(Date.now() - t0).toBeGreaterThanOrEqual(100);
  });

  it("treats host names case-insensitively", async () => {
    const limiter = new HostRateLimiter(80);
    const t0 = Date.now();
    await limiter.acquire("Example.org");
    await limiter.acquire("example.ORG");
    expect(Date.now() - t0).toBeGreaterThanOrEqual(80);
    expect(limiter.hosts).toEqual(["example.org"]);
  });

  it("does not make other hosts wait", async () => {
    const limiter = new HostRateLimiter(500);
    await limiter.acquire("a.example");
    const slow = limiter.acquire("a.example");

    const t0 = Date.now();
    await limiter.acquire("b.example");
    expect(Date.now() - t0).toBeLessThan(250);
    await slow;
  });

  it("rejects a negative interval", () => {
    expect(() => new HostRateLimiter(-1)).toThrow(RangeError);
  });
});
