/**
 * PipelineContext tests
 */

import { describe, it, expect } from "@jest/globals";
import { z } from "zod";
import { PipelineContext, StageContext, readStageOutput } from "../pipeline-context";
import { StageContractViolationError } from "../../errors/pipeline-errors";

const NoteContract = {
  description: "A note",
  schema: z.object({ value: z.string() }),
};

function stageContext(outputs: ReadonlyMap<string, unknown>): StageContext<string> {
  return { runId: "run-1", request: "x", outputs };
}

describe("PipelineContext", () => {
  it("should record each stage once", () => {
    const context = new PipelineContext();
    context.record("a", { value: "1" });

    expect(context.has("a")).toBe(true);
    expect(() => context.record("a", { value: "2" })).toThrow(
      '[PipelineContext] Output for stage "a" already recorded'
    );
    expect(context.entries()).toEqual([{ stage: "a", output: { value: "1" } }]);
  });

  it("should keep recorded outputs independent of the caller's object", () => {
    const context = new PipelineContext();
    const output = { items: ["one"] };
    context.record("a", output);
    output.items.push("two");

    expect(context.snapshot().get("a")).toEqual({ items: ["one"] });
  });

  it("should deep-freeze recorded outputs", () => {
    const context = new PipelineContext();
    context.record("a", [{ list: [1, 2] }]);

    const stored = context.snapshot().get("a");
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Array.isArray(stored) && Object.isFrozen(stored[0])).toBe(true);
    expect(Array.isArray(stored) && Object.isFrozen(stored[0].list)).toBe(true);
  });

  it("should not change an earlier snapshot when recording more", () => {
    const context = new PipelineContext();
    context.record("a", { value: "1" });
    const snapshot = context.snapshot();
    context.record("b", { value: "2" });

    expect(Array.from(snapshot.keys())).toEqual(["a"]);
    expect(context.stageNames()).toEqual(["a", "b"]);
  });
});

describe("readStageOutput", () => {
  it("should return a valid upstream output", () => {
    const outputs = new Map<string, unknown>([["writer", { value: "hello" }]]);
    expect(readStageOutput(stageContext(outputs), "reader", "writer", NoteContract)).toEqual({
      value: "hello",
    });
  });

  it("should reject a missing upstream output", () => {
    expect(() =>
      readStageOutput(stageContext(new Map()), "reader", "writer", NoteContract)
    ).toThrow('Stage "reader" violated its output contract: missing output from upstream stage "writer"');
  });

  it("should reject a malformed upstream output", () => {
    const outputs = new Map<string, unknown>([["writer", { value: 7 }]]);
    let error: unknown;
    try {
      readStageOutput(stageContext(outputs), "reader", "writer", NoteContract);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(StageContractViolationError);
    if (error instanceof StageContractViolationError) {
      expect(error.stage).toBe("reader");
      expect(error.issues).toEqual(['upstream "writer" value: Expected string, received number']);
    }
  });
});
