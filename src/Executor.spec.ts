import FakeTimers from "@sinonjs/fake-timers";
import {
  delayedExecutor,
  immediateExecutor,
  inlineExecutor,
  isExecutor,
  microtaskExecutor,
  trampolineExecutor,
} from "./Executor";
import { expect } from "./_chai.spec";

describe("Executor", () => {
  describe("isExecutor()", () => {
    it("accepts functions", () => {
      expect(isExecutor(inlineExecutor)).to.eql(true);
      expect(isExecutor((work: () => void) => work())).to.eql(true);
    });
    it("rejects everything else", () => {
      expect(isExecutor(undefined)).to.eql(false);
      expect(isExecutor(42)).to.eql(false);
      expect(isExecutor({ run: inlineExecutor })).to.eql(false);
    });
  });

  describe("inlineExecutor", () => {
    it("runs work before returning", () => {
      let ran = 0;
      inlineExecutor(() => ran++);
      expect(ran).to.eql(1);
    });
  });

  describe("microtaskExecutor and immediateExecutor", () => {
    it("defer work, microtasks first", async () => {
      const order: string[] = [];
      immediateExecutor(() => order.push("immediate"));
      microtaskExecutor(() => order.push("microtask"));
      order.push("sync");
      await new Promise<void>((resolve) => setImmediate(() => resolve()));
      expect(order).to.eql(["sync", "microtask", "immediate"]);
    });
  });

  describe("delayedExecutor()", () => {
    let clock: FakeTimers.InstalledClock;

    beforeEach(() => {
      clock = FakeTimers.install({ toFake: ["setTimeout", "clearTimeout"] });
    });

    afterEach(() => {
      clock.uninstall();
    });

    it("runs work once the delay has passed", () => {
      let ran = 0;
      delayedExecutor(100)(() => ran++);
      clock.tick(99);
      expect(ran).to.eql(0);
      clock.tick(1);
      expect(ran).to.eql(1);
      clock.tick(1000);
      expect(ran).to.eql(1);
    });

    it("rejects negative delays", () => {
      expect(() => delayedExecutor(-1)).to.throw(
        "delayedExecutor: millis must be >= 0, got -1",
      );
    });

    it("rejects NaN", () => {
      expect(() => delayedExecutor(NaN)).to.throw(/millis must be >= 0/);
    });
  });

  describe("trampolineExecutor()", () => {
    it("runs work inline when idle", () => {
      const t = trampolineExecutor();
      let ran = 0;
      t(() => ran++);
      expect(ran).to.eql(1);
    });

    it("queues work submitted while running", () => {
      const t = trampolineExecutor();
      const order: string[] = [];
      t(() => {
        order.push("a1");
        t(() => order.push("b"));
        t(() => order.push("c"));
        order.push("a2");
      });
      expect(order).to.eql(["a1", "a2", "b", "c"]);
    });

    it("differs from inline, which nests", () => {
      const order: string[] = [];
      inlineExecutor(() => {
        order.push("a1");
        inlineExecutor(() => order.push("b"));
        order.push("a2");
      });
      expect(order).to.eql(["a1", "b", "a2"]);
    });

    it("keeps working after a work item throws", () => {
      const t = trampolineExecutor();
      expect(() =>
        t(() => {
          throw new Error("boom");
        }),
      ).to.throw("boom");
      let ran = false;
      t(() => (ran = true));
      expect(ran).to.eql(true);
    });

    it("trampolines are independent", () => {
      const t1 = trampolineExecutor();
      const t2 = trampolineExecutor();
      const order: string[] = [];
      t1(() => {
        t2(() => order.push("t2"));
        order.push("t1");
      });
      expect(order).to.eql(["t2", "t1"]);
    });
  });
});
