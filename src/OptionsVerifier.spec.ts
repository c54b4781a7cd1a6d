import { inlineExecutor, microtaskExecutor } from "./Executor";
import { FutureOptions } from "./FutureOptions";
import { logger, NoLogger } from "./Logger";
import { verifyOptions } from "./OptionsVerifier";
import { expect } from "./_chai.spec";

describe("verifyOptions()", () => {
  it("returns defaults when given nothing", () => {
    const opts = verifyOptions();
    expect(opts.executor).to.equal(inlineExecutor);
    expect(opts.settlement).to.eql("strict");
    expect(opts.logger).to.equal(logger);
  });

  it("matches a fresh FutureOptions", () => {
    expect(verifyOptions()).to.eql({ ...new FutureOptions() });
  });

  it("treats a function as the executor", () => {
    const opts = verifyOptions(microtaskExecutor);
    expect(opts.executor).to.equal(microtaskExecutor);
    expect(opts.settlement).to.eql("strict");
  });

  it("merges partial options over the defaults", () => {
    const l = () => NoLogger;
    const opts = verifyOptions({ settlement: "lenient", logger: l });
    expect(opts.executor).to.equal(inlineExecutor);
    expect(opts.settlement).to.eql("lenient");
    expect(opts.logger).to.equal(l);
  });

  it("reports every invalid option", () => {
    expect(() =>
      verifyOptions(
        JSON.parse('{"executor":"now","settlement":"sloppy","logger":1}'),
      ),
    ).to.throw(
      "Future was given invalid options: " +
        "executor must be a function that accepts a work item; " +
        "settlement must be one of strict, lenient, got sloppy; " +
        "logger must be a function that returns a Logger",
    );
  });
});
