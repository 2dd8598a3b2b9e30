import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Lineage, { createGeneratingSequence } from "../../src/Lineage";

class Folder {
  constructor(
    readonly name: string,
    public parent: Folder | null = null,
  ) {}
}

const upTo = (limit: number) => (n: number) => (n < limit ? n + 1 : null);

describe("Lineage", () => {
  beforeEach(() => {
    Lineage.setMode("production");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should create quiet sequences in production mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const sequence = Lineage.generate(() => 1, upTo(2));

    expect(sequence.debug).toBe(false);
    expect(sequence.verbose).toBe(false);
    expect(sequence.toArray()).toEqual([1, 2]);
    expect(log).not.toHaveBeenCalled();
  });

  it("should log traversal start and end in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    Lineage.setMode("debug");
    const sequence = Lineage.generate(() => 1, upTo(2));

    expect(sequence.debug).toBe(true);
    expect(sequence.verbose).toBe(false);
    sequence.toArray();

    expect(log.mock.calls).toEqual([
      ["Traversal START:", "generate", sequence.id],
      ["Traversal END:", "generate", sequence.id, "2 values"],
    ]);
  });

  it("should log the end of a traversal stopped early", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    Lineage.setMode("debug");
    const sequence = Lineage.generate(
      () => 1,
      (n) => n + 1,
    );

    expect(sequence.take(2).toArray()).toEqual([1, 2]);
    expect(sequence.first()).toBe(1);

    expect(log.mock.calls).toEqual([
      ["Traversal START:", "generate", sequence.id],
      ["Traversal END:", "generate", sequence.id, "2 values"],
      ["Traversal START:", "generate", sequence.id],
      ["Traversal END:", "generate", sequence.id, "1 values"],
    ]);
  });

  it("should not log an end for a traversal that never started", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    Lineage.setMode("debug");
    const traversal = Lineage.generate(() => 1, upTo(3)).iterator();

    traversal.return();

    expect(traversal.done).toBe(true);
    expect(log).not.toHaveBeenCalled();
  });

  it("should log every value in verbose mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    Lineage.setMode("verbose");
    const sequence = Lineage.generate(() => 1, upTo(2));

    sequence.toArray();

    expect(log.mock.calls).toEqual([
      ["Traversal START:", "generate", sequence.id],
      ["Traversal STEP:", "generate", 0, "1"],
      ["Traversal STEP:", "generate", 1, "2"],
      ["Traversal END:", "generate", sequence.id, "2 values"],
    ]);
  });

  it("should describe objects by their class when logging", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    Lineage.setMode("verbose");
    const root = new Folder("root");

    Lineage.ancestors(new Folder("src", root), (f) => f.parent).toArray();

    expect(log).toHaveBeenCalledWith("Traversal STEP:", "generate", 0, "[Folder]");
    expect(log).toHaveBeenCalledWith("Traversal STEP:", "generate", 1, "[Folder]");
  });

  it("should log failures in debug mode and rethrow them", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    Lineage.setMode("debug");
    const failure = new Error("broken link");
    const sequence = Lineage.generate(
      () => 1,
      () => {
        throw failure;
      },
    );

    expect(() => sequence.toArray()).toThrow(failure);
    expect(error).toHaveBeenCalledWith(
      "Traversal FAILED:",
      "generate",
      sequence.id,
      failure,
    );
  });

  it("should apply a mode change to new sequences only", () => {
    const before = Lineage.generate(() => 1, upTo(2));
    Lineage.setMode("debug");
    const after = Lineage.generate(() => 1, upTo(2));

    expect(before.debug).toBe(false);
    expect(after.debug).toBe(true);
  });

  it("should honour the mode in createGeneratingSequence", () => {
    Lineage.setMode("verbose");
    const sequence = createGeneratingSequence(() => 1, upTo(2));

    expect(sequence.debug).toBe(true);
    expect(sequence.verbose).toBe(true);
  });

  it("should list ancestors from a node up to the root", () => {
    const root = new Folder("root");
    const src = new Folder("src", root);
    const lib = new Folder("lib", src);

    const ancestors = Lineage.ancestors(lib, (f) => f.parent);

    expect(ancestors.map((f) => f.name).toArray()).toEqual([
      "lib",
      "src",
      "root",
    ]);
    expect(ancestors.reversed().map((f) => f.name)).toEqual([
      "root",
      "src",
      "lib",
    ]);
  });

  it("should see a live hierarchy change on the next traversal", () => {
    const root = new Folder("root");
    const src = new Folder("src", root);
    const lib = new Folder("lib", src);
    const ancestors = Lineage.ancestors(lib, (f) => f.parent);

    expect(ancestors.count()).toBe(3);
    lib.parent = root;
    expect(ancestors.map((f) => f.name).toArray()).toEqual(["lib", "root"]);
  });

  it("should print a summary block", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const sequence = Lineage.generate(() => 1, upTo(2));

    sequence.log();

    expect(log).toHaveBeenCalledTimes(5);
    expect(log).toHaveBeenNthCalledWith(2, "Sequence", "generate");
    expect(log).toHaveBeenNthCalledWith(3, "id:", sequence.id);
    expect(log).toHaveBeenNthCalledWith(4, "debug:", false, "verbose:", false);
  });
});
