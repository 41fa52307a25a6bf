import { silentLogger } from "../logger.js";
import { FakeLighting, FakePortal, ManualClock, START_TIME, testScenario } from "../testing/fakes.js";
import { EventIntake } from "./event-intake.js";
import { ScenarioMachine } from "./scenario-machine.js";
import { StatusStore } from "./status-store.js";

const PERSON_TOPIC = "frigate/entrance/person";
const PORTAL_TOPIC = "portal/state";

function setup(cooldownSeconds = 60) {
  const clock = new ManualClock();
  const store = new StatusStore(cooldownSeconds, clock);
  const portal = new FakePortal();
  const lighting = new FakeLighting();
  const logger = silentLogger();
  const machine = new ScenarioMachine({ store, portal, lighting, scenario: testScenario(), clock, logger });
  const intake = new EventIntake({
    store,
    machine,
    topics: { personTopic: PERSON_TOPIC, portalStateTopic: PORTAL_TOPIC },
    logger,
  });
  return { clock, store, portal, intake };
}

describe("EventIntake.submit", () => {
  it("admits only one trigger while a sequence is running", async () => {
    const { clock, store, intake } = setup();

    const first = intake.submit({ origin: "manual", source: "api" });
    await clock.advance(5_000);
    const second = intake.submit({ origin: "bus", source: PERSON_TOPIC });

    expect(first).toMatchObject({ admitted: true, triggerNumber: 1 });
    expect(second).toEqual({ admitted: false, reason: "running", cooldownRemainingSeconds: 55 });
    expect(store.read().totalTriggers).toBe(1);
  });

  it("rejects during cooldown and admits again once it has elapsed", async () => {
    const { clock, store, intake } = setup();

    intake.submit({ origin: "manual", source: "api" });
    await clock.advance(31_000);
    const during = intake.submit({ origin: "manual", source: "api" });
    await clock.advance(29_000);
    const after = intake.submit({ origin: "manual", source: "api" });

    expect(during).toEqual({ admitted: false, reason: "cooldown", cooldownRemainingSeconds: 29 });
    expect(after).toMatchObject({ admitted: true, triggerNumber: 2 });
    expect(store.read().lastTriggerTime).toBe(new Date(START_TIME + 60_000).toISOString());
  });

  it("counts admissions only", async () => {
    const { clock, store, intake } = setup(30);

    for (let i = 0; i < 3; i += 1) {
      intake.submit({ origin: "manual", source: "api" });
      intake.submit({ origin: "manual", source: "api" });
      await clock.advance(30_000);
    }

    expect(store.read().totalTriggers).toBe(3);
  });

  it("rejects bus triggers while auto-trigger is off but admits manual ones", () => {
    const { store, intake } = setup();
    store.withLock((record) => {
      record.autoTriggerEnabled = false;
    });

    const fromBus = intake.submit({ origin: "bus", source: PERSON_TOPIC });
    const manual = intake.submit({ origin: "manual", source: "api" });

    expect(fromBus).toEqual({ admitted: false, reason: "auto-disabled", cooldownRemainingSeconds: 0 });
    expect(manual).toMatchObject({ admitted: true, triggerNumber: 1 });
  });
});

describe("EventIntake.handleBusMessage", () => {
  it("triggers on a positive person count", () => {
    const { store, portal, intake } = setup();

    intake.handleBusMessage(PERSON_TOPIC, Buffer.from("2"));

    const status = store.read();
    expect(status.state).toBe("running");
    expect(status.lastPersonCount).toBe(2);
    expect(status.activeTrigger).toEqual({
      origin: "bus",
      source: PERSON_TOPIC,
      startedAt: new Date(START_TIME).toISOString(),
    });
    expect(portal.calls).toEqual(["getState"]);
  });

  it("records a zero count without triggering", () => {
    const { store, portal, intake } = setup();

    intake.handleBusMessage(PERSON_TOPIC, "0");

    const status = store.read();
    expect(status.lastPersonCount).toBe(0);
    expect(status.lastBusMessage).toEqual({
      topic: PERSON_TOPIC,
      payload: "0",
      timestamp: new Date(START_TIME).toISOString(),
    });
    expect(status.totalTriggers).toBe(0);
    expect(portal.calls).toEqual([]);
  });

  it("keeps the previous count when the payload is not a count", async () => {
    const { clock, store, intake } = setup(30);
    intake.handleBusMessage(PERSON_TOPIC, "3");
    await clock.advance(30_000);

    intake.handleBusMessage(PERSON_TOPIC, "{\"count\":4}");

    const status = store.read();
    expect(status.lastPersonCount).toBe(3);
    expect(status.lastBusMessage?.payload).toBe("{\"count\":4}");
    expect(status.totalTriggers).toBe(1);
  });

  it("does not trigger from the bus when auto-trigger is off", () => {
    const { store, intake } = setup();
    store.withLock((record) => {
      record.autoTriggerEnabled = false;
    });

    intake.handleBusMessage(PERSON_TOPIC, "1");

    expect(store.read().lastPersonCount).toBe(1);
    expect(store.read().totalTriggers).toBe(0);
  });

  it("tracks the portal state topic without triggering", () => {
    const { store, intake } = setup();

    intake.handleBusMessage(PORTAL_TOPIC, " 2 ");
    intake.handleBusMessage(PORTAL_TOPIC, "7");

    const status = store.read();
    expect(status.portalReportedState).toBe(2);
    expect(status.portalLastUpdate).toBe(new Date(START_TIME).toISOString());
    expect(status.lastBusMessage?.payload).toBe("7");
    expect(status.totalTriggers).toBe(0);
  });

  it("ignores unrelated topics apart from recording them", () => {
    const { store, intake } = setup();

    intake.handleBusMessage("frigate/garage/person", "1");

    expect(store.read().lastBusMessage?.topic).toBe("frigate/garage/person");
    expect(store.read().lastPersonCount).toBe(0);
    expect(store.read().totalTriggers).toBe(0);
  });
});
