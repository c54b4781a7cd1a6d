import { immediateExecutor } from "./Executor";
import { futures } from "./FutureFactory";
import { ManualExecutor, expect } from "./_chai.spec";

describe("futures()", () => {
  it("binds every future to the given executor", () => {
    const m = new ManualExecutor();
    const { future, resolve, reject, options } = futures(m.executor);
    expect(options.executor).to.equal(m.executor);

    const f = future<number>((res) => res(1));
    expect(f.pending).to.eql(true);
    expect(m.submitted).to.eql(1);
    m.runAll();
    expect(f.fulfilled).to.eql(true);

    expect(resolve(2).executor).to.equal(m.executor);
    const r = reject<number>(new Error("nope"));
    expect(r.rejected).to.eql(true);
    expect(r.executor).to.equal(m.executor);
  });

  it("accepts options", () => {
    const { options, resolve } = futures({
      executor: immediateExecutor,
      settlement: "lenient",
    });
    expect(options.settlement).to.eql("lenient");
    return expect(
      resolve(21)
        .then((n) => n * 2)
        .toPromise(),
    ).to.become(42);
  });

  it("verifies options once, up front", () => {
    expect(() => futures(JSON.parse('{"executor":42}'))).to.throw(
      "Future was given invalid options: executor must be a function that accepts a work item",
    );
  });
});
