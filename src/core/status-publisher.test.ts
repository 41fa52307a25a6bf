import { silentLogger } from "../logger.js";
import { MqttStatusOutput } from "../outputs/mqtt-output.js";
import type { StatusOutput } from "../outputs/output.js";
import { ManualClock } from "../testing/fakes.js";
import { StatusPublisher } from "./status-publisher.js";
import type { ScenarioStatus } from "./status-store.js";
import { StatusStore } from "./status-store.js";

class RecordingOutput implements StatusOutput {
  readonly pushed: ScenarioStatus[] = [];
  constructor(readonly id: string) {}
  push(status: ScenarioStatus): void {
    this.pushed.push(status);
  }
}

describe("StatusPublisher", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("pushes every store change to each output", () => {
    const store = new StatusStore(30, new ManualClock());
    const first = new RecordingOutput("first");
    const second = new RecordingOutput("second");
    const publisher = new StatusPublisher([first, second], silentLogger());
    publisher.attach(store);

    store.withLock((record) => {
      record.busConnected = true;
    });

    expect(first.pushed.map((status) => status.busConnected)).toEqual([true]);
    expect(second.pushed).toHaveLength(1);
    publisher.stop();
  });

  it("keeps publishing when one output throws", () => {
    const store = new StatusStore(30, new ManualClock());
    const broken: StatusOutput = {
      id: "broken",
      push: () => {
        throw new Error("socket closed");
      },
    };
    const healthy = new RecordingOutput("healthy");
    const publisher = new StatusPublisher([broken, healthy], silentLogger());
    publisher.attach(store);

    store.withLock((record) => {
      record.haAvailable = true;
    });

    expect(healthy.pushed).toHaveLength(1);
    publisher.stop();
  });

  it("ticks during cooldown and once more when it ends", async () => {
    jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick"] });
    const clock = new ManualClock();
    const store = new StatusStore(3, clock);
    const output = new RecordingOutput("ticks");
    const publisher = new StatusPublisher([output], silentLogger());
    store.withLock((record, now) => {
      record.lastTriggerTime = now;
    });

    publisher.startTicker(store, 1000);
    for (let second = 0; second < 5; second += 1) {
      await clock.advance(1000);
      jest.advanceTimersByTime(1000);
    }
    publisher.stop();

    expect(output.pushed.map((status) => status.cooldownRemainingSeconds)).toEqual([2, 1, 0]);
    expect(output.pushed.map((status) => status.state)).toEqual(["cooldown", "cooldown", "idle"]);
  });
});

describe("MqttStatusOutput", () => {
  it("publishes the snapshot retained under the status topic", () => {
    const publishRetained = jest.fn();
    const output = new MqttStatusOutput({ publishRetained }, "portal-scenario");
    const status = new StatusStore(30, new ManualClock()).read();

    output.push(status);

    expect(output.topic).toBe("portal-scenario/status");
    expect(publishRetained).toHaveBeenCalledWith("portal-scenario/status", JSON.stringify(status));
  });
});
