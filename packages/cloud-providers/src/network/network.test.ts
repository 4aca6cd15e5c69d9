import { LocalToolError } from "@vpnkeeper/core";
import { IpInfoLookup } from "./ipinfo-lookup";
import { PingProbe, pingArgs } from "./ping-probe";

const LOOKUP_URL = "https://ipinfo.example.test/json";

describe("IpInfoLookup", () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("returns the address and country", async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ ip: "34.1.2.3", country: "US", city: "Council Bluffs" }), { status: 200 })
    );

    await expect(new IpInfoLookup({ url: LOOKUP_URL }).lookup()).resolves.toEqual({ ip: "34.1.2.3", country: "US" });
    expect(fetchSpy).toHaveBeenCalledWith(LOOKUP_URL, expect.objectContaining({ headers: { Accept: "application/json" } }));
  });

  it("tolerates a missing country", async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ ip: "203.0.113.7" }), { status: 200 }));

    await expect(new IpInfoLookup({ url: LOOKUP_URL }).lookup()).resolves.toEqual({ ip: "203.0.113.7", country: null });
  });

  it("returns null on an HTTP error", async () => {
    fetchSpy.mockResolvedValue(new Response("rate limited", { status: 429 }));
    const log = jest.fn();

    await expect(new IpInfoLookup({ url: LOOKUP_URL, log }).lookup()).resolves.toBeNull();
    expect(log).toHaveBeenCalledWith("Public IP lookup returned HTTP 429", "stderr");
  });

  it("returns null on an unexpected body", async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ address: "x" }), { status: 200 }));

    await expect(new IpInfoLookup({ url: LOOKUP_URL }).lookup()).resolves.toBeNull();
  });

  it("returns null when the request fails", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));
    const log = jest.fn();

    await expect(new IpInfoLookup({ url: LOOKUP_URL, log }).lookup()).resolves.toBeNull();
    expect(log).toHaveBeenCalledWith("Public IP lookup failed: fetch failed", "stderr");
  });
});

describe("PingProbe", () => {
  it("reports a reply as reachable", async () => {
    const run = jest.fn().mockResolvedValue({ stdout: "1 packets received", stderr: "" });

    await expect(new PingProbe(run).isReachable("8.8.8.8")).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith("ping", pingArgs("8.8.8.8"));
  });

  it("reports a failed ping as unreachable", async () => {
    const run = jest.fn().mockRejectedValue(new LocalToolError("ping -c 1 -W 2 8.8.8.8", "100% packet loss"));

    await expect(new PingProbe(run).isReachable("8.8.8.8")).resolves.toBe(false);
  });

  it("reports a missing ping binary as an unknown result", async () => {
    const run = jest
      .fn()
      .mockRejectedValue(new LocalToolError("ping -c 1 -W 2 8.8.8.8", "spawn ping ENOENT", undefined, "spawn"));

    await expect(new PingProbe(run).isReachable("8.8.8.8")).resolves.toBeNull();
  });

  it("propagates unexpected errors", async () => {
    const run = jest.fn().mockRejectedValue(new Error("boom"));

    await expect(new PingProbe(run).isReachable("8.8.8.8")).rejects.toThrow("boom");
  });

  it("uses the platform's timeout flag", () => {
    expect(pingArgs("1.1.1.1", "linux")).toEqual(["-c", "1", "-W", "2", "1.1.1.1"]);
    expect(pingArgs("1.1.1.1", "darwin")).toEqual(["-c", "1", "-t", "2", "1.1.1.1"]);
  });
});
