/**
 * ContextStore tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { ContextStore, INPUT_KEY, PIPELINE_PRODUCER } from "../context-store";
import { ContextOwnershipError } from "../../errors/pipeline-errors";

describe("ContextStore", () => {
  let store: ContextStore;

  beforeEach(() => {
    store = new ContextStore();
  });

  it("keeps every write in history and the latest as current", () => {
    store.set("a", 1);
    store.set("b", "two");
    store.set("a", 3);

    expect(store.get("a")).toBe(3);
    expect(store.historyOf("a")).toEqual([1, 3]);
    expect(store.log().map((e) => [e.key, e.sequence])).toEqual([
      ["a", 1],
      ["b", 2],
      ["a", 3],
    ]);
    expect(store.entriesOf("b")[0].producer).toBe(PIPELINE_PRODUCER);
  });

  it("marks accumulating writes", () => {
    store.set("notes", "first");
    store.append("notes", "second");

    expect(store.entriesOf("notes").map((e) => e.operation)).toEqual(["set", "append"]);
    expect(store.get("notes")).toBe("second");
  });

  it("distinguishes falsy values from absent keys", () => {
    store.set("zero", 0);
    store.set("empty", "");
    store.set("nothing", null);

    expect(store.has("zero")).toBe(true);
    expect(store.get("empty")).toBe("");
    expect(store.get("nothing")).toBeNull();
    expect(store.has("missing")).toBe(false);
    expect(store.get("missing")).toBeUndefined();
  });

  it("rejects writes to a key owned by another stage", () => {
    store.declareOwner("project_analysis", "analysis");

    expect(() => store.set("project_analysis", "x", "research")).toThrow(ContextOwnershipError);
    expect(() => store.set("project_analysis", "x", "research")).toThrow(
      'Context key "project_analysis" is owned by "analysis" and cannot be written by "research"'
    );
    store.set("project_analysis", "ok", "analysis");
    expect(store.get("project_analysis")).toBe("ok");
  });

  it("refuses a second owner for a key", () => {
    store.declareOwner(INPUT_KEY, PIPELINE_PRODUCER);

    expect(() => store.declareOwner(INPUT_KEY, "analysis")).toThrow(ContextOwnershipError);
    expect(store.ownerOf(INPUT_KEY)).toBe(PIPELINE_PRODUCER);
  });

  it("commits all writes or none", () => {
    store.declareOwner("theirs", "other");

    expect(() => store.commit("mine", { ours: 1, theirs: 2 })).toThrow(ContextOwnershipError);
    expect(store.has("ours")).toBe(false);
    expect(store.log()).toHaveLength(0);

    expect(store.commit("mine", { ours: 1, more: 2 })).toEqual(["ours", "more"]);
    expect(store.toJSON()).toEqual({ ours: 1, more: 2 });
  });

  it("keeps stored values apart from the objects written and read", () => {
    const written = { files: ["a.ts"] };
    store.commit("analysis", { analysis: written });
    written.files.push("b.ts");

    const read = store.snapshot().get("analysis");
    if (read === null || typeof read !== "object" || Array.isArray(read)) {
      throw new Error("expected an object");
    }
    const files = read.files;
    if (!Array.isArray(files)) {
      throw new Error("expected an array");
    }

    expect(() => files.push("c.ts")).toThrow(TypeError);
    expect(store.get("analysis")).toEqual({ files: ["a.ts"] });
    expect(store.historyOf("analysis")).toEqual([{ files: ["a.ts"] }]);
    expect(Object.isFrozen(store.entriesOf("analysis")[0].value)).toBe(true);
  });

  it("hands out snapshots that do not follow later writes", () => {
    store.set("a", 1);
    const snapshot = store.snapshot();
    store.set("a", 2);
    store.set("b", 3);

    expect(snapshot.get("a")).toBe(1);
    expect(snapshot.has("b")).toBe(false);
    expect(snapshot.allKeys()).toEqual(new Set(["a"]));
    expect(snapshot.sequence).toBe(1);
  });
});
