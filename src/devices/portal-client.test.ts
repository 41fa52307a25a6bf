import { AxiosStub } from "../testing/axios-stub.js";
import { createPortalHttp, parsePortalState, PortalClient } from "./portal-client.js";

describe("parsePortalState", () => {
  it("accepts the three portal states as numbers or strings", () => {
    expect(parsePortalState(1)).toBe(1);
    expect(parsePortalState(" 3\n")).toBe(3);
  });

  it("rejects anything else", () => {
    expect(parsePortalState(4)).toBeNull();
    expect(parsePortalState("red")).toBeNull();
    expect(parsePortalState(null)).toBeNull();
  });
});

describe("PortalClient", () => {
  function setup() {
    const http = createPortalHttp("http://portal.test", 5000);
    const stub = new AxiosStub(http);
    return { stub, client: new PortalClient(http) };
  }

  it("reads the current state", async () => {
    const { stub, client } = setup();
    stub.respond({ state: 1 });

    await expect(client.getState()).resolves.toEqual({ ok: true, value: 1 });
    expect(stub.requests[0]).toMatchObject({ method: "GET", url: "/state", baseURL: "http://portal.test" });
  });

  it("maps each command onto its endpoint", async () => {
    const { stub, client } = setup();
    stub.respond({ status: "ok", state: 2 }).respond({ state: 2 }).respond({ state: 3 }).respond({ state: 1 });

    const results = [await client.toggle(), await client.forceRed(), await client.forceGreen(), await client.reset()];

    expect(stub.requests.map((request) => request.url)).toEqual(["/toggle", "/red", "/green", "/reset"]);
    expect(results).toEqual([
      { ok: true, value: 2 },
      { ok: true, value: 2 },
      { ok: true, value: 3 },
      { ok: true, value: 1 },
    ]);
  });

  it("reports a body without a valid state as a bad response", async () => {
    const { stub, client } = setup();
    stub.respond({ state: 9 });

    await expect(client.getState()).resolves.toEqual({
      ok: false,
      reason: "bad-response",
      message: "Unexpected portal response for /state",
    });
  });

  it("reports timeouts", async () => {
    const { stub, client } = setup();
    stub.timeout();

    await expect(client.toggle()).resolves.toEqual({
      ok: false,
      reason: "timeout",
      message: "timeout of 5000ms exceeded",
    });
  });

  it("reports refused connections as unreachable", async () => {
    const { stub, client } = setup();
    stub.refuse();

    await expect(client.reset()).resolves.toEqual({
      ok: false,
      reason: "unreachable",
      message: "connect ECONNREFUSED 127.0.0.1:80",
    });
  });

  it("reports HTTP errors with their status", async () => {
    const { stub, client } = setup();
    stub.respond({ error: "busy" }, 500);

    await expect(client.forceRed()).resolves.toEqual({ ok: false, reason: "bad-response", message: "HTTP 500" });
  });
});
