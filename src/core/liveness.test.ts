import { silentLogger } from "../logger.js";
import { FakeLighting, FakePortal, ManualClock, START_TIME } from "../testing/fakes.js";
import { LivenessMonitor } from "./liveness.js";
import { StatusStore } from "./status-store.js";

function setup() {
  const clock = new ManualClock();
  const store = new StatusStore(30, clock);
  const portal = new FakePortal();
  const lighting = new FakeLighting();
  const monitor = new LivenessMonitor({ store, portal, lighting, clock, logger: silentLogger() });
  return { store, portal, lighting, monitor };
}

const timestamp = new Date(START_TIME).toISOString();

describe("LivenessMonitor", () => {
  it("reports a reachable portal and its state", async () => {
    const { store, portal, monitor } = setup();
    portal.state = 3;

    await expect(monitor.pingPortal()).resolves.toEqual({ success: true, state: 3, timestamp });
    expect(store.read().portalOnline).toBe(true);
    expect(store.read().portalReportedState).toBe(3);
    expect(store.read().portalLastUpdate).toBe(timestamp);
  });

  it("marks the portal offline when it does not answer", async () => {
    const { store, portal, monitor } = setup();
    await monitor.pingPortal();
    portal.online = false;

    await expect(monitor.pingPortal()).resolves.toEqual({
      success: false,
      error: "Failed to connect to portal",
      timestamp,
    });
    expect(store.read().portalOnline).toBe(false);
    expect(store.read().portalReportedState).toBe(1);
  });

  it("tracks lighting availability", async () => {
    const { store, lighting, monitor } = setup();

    await expect(monitor.pingLighting()).resolves.toEqual({ success: true, timestamp });
    expect(store.read().haAvailable).toBe(true);

    lighting.available = false;
    await expect(monitor.pingLighting()).resolves.toEqual({
      success: false,
      error: "Lighting controller not responding",
      timestamp,
    });
    expect(store.read().haAvailable).toBe(false);
  });

  it("probes both devices on its interval", async () => {
    jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick"] });
    try {
      const { portal, lighting, monitor } = setup();
      monitor.start(15_000);

      jest.advanceTimersByTime(30_000);
      monitor.stop();
      jest.advanceTimersByTime(30_000);

      expect(portal.calls).toEqual(["getState", "getState"]);
      expect(lighting.calls).toEqual([{ kind: "health" }, { kind: "health" }]);
    } finally {
      jest.useRealTimers();
    }
  });
});
