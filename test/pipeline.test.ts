/**
 * Tests for the pass pipeline and the compile entry point.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  eAssign,
  eBinary,
  eBlock,
  eCall,
  eDef,
  eDefp,
  eField,
  eInt,
  eList,
  eModule,
  eUnary,
  eVar,
  eWhile,
  pVar,
} from "../src/ast/elixir-ast";
import { compileModule } from "../src/compile";
import { ErrorCodes, LoweringError } from "../src/errors";
import { Logger } from "../src/logger";
import { PASS_NAMES } from "../src/passes/pass";
import { createPipeline, DEFAULT_PASSES, TransformPipeline } from "../src/passes/pipeline";

const lines = (...text: string[]) => text.join("\n");

const bits = () =>
  eModule("Bits", [
    eDef("mask", [pVar("a")], eBinary("&", eVar("a"), eInt(255))),
    eDefp("helper", [pVar("x")], eInt(0)),
  ]);

const counter = (param: string) =>
  eModule("Counter", [
    eDef("bump", [pVar(param)], eBlock([eUnary("increment", eField(eVar(param), "count")), eVar(param)])),
  ]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("pipeline", () => {
  it("runs the passes in their fixed order", () => {
    expect(DEFAULT_PASSES.map((p) => p.name)).toEqual([...PASS_NAMES]);
  });

  it("applies per-pass toggles", () => {
    const pipeline = createPipeline({ passes: { "pipe-operator": false } });
    expect(pipeline.passes.find((p) => p.name === "pipe-operator")?.enabled).toBe(false);
    expect(pipeline.passes.filter((p) => p.enabled)).toHaveLength(PASS_NAMES.length - 1);
  });

  it("logs each pass at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger({ level: "debug", namespace: "lowering" });
    createPipeline({ logger, passes: { "usage-hygiene": false } }).transform(eInt(1));

    expect(debug).toHaveBeenCalledTimes(PASS_NAMES.length);
    expect(debug).toHaveBeenCalledWith("[lowering:pipeline] run clause-local-resolution");
    expect(debug).toHaveBeenCalledWith("[lowering:pipeline] skip usage-hygiene");
  });

  it("lets passes log through the pipeline logger", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const unrolled = eBlock(
      [
        eAssign("g", eList([])),
        ...[1, 5, 9].map((k) => eAssign("g", eBinary("++", eVar("g"), eList([eInt(k)])))),
        eVar("g"),
      ],
      { unrolledLoop: true }
    );
    createPipeline({ logger: new Logger({ level: "debug" }) }).transform(unrolled);
    expect(debug).toHaveBeenCalledWith("[pipeline] unrolled loop kept as written: no element template");
  });

  it("notes the failing pass on a lowering error", () => {
    const pipeline = new TransformPipeline([
      {
        name: "pipe-operator",
        enabled: true,
        run: () => {
          throw new LoweringError(ErrorCodes.InvalidInput, "bad tree", "transform");
        },
      },
    ]);
    let caught: unknown;
    try {
      pipeline.transform(eInt(1));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LoweringError);
    if (!(caught instanceof LoweringError)) return;
    expect(caught.notes).toEqual([{ message: "in pass pipe-operator" }]);
  });
});

describe("compileModule", () => {
  it("lowers instance mutation", () => {
    expect(compileModule(counter("struct")).source).toBe(
      lines(
        "defmodule Counter do",
        "  def bump(struct) do",
        "    struct = %{struct | count: struct.count + 1}",
        "    struct",
        "  end",
        "end"
      )
    );
  });

  it("uses the configured instance parameter", () => {
    const { source } = compileModule(counter("self"), { instanceParam: "self" });
    expect(source.split("\n")[2]).toBe("    self = %{self | count: self.count + 1}");
  });

  it("adds module extras and underscores unused parameters", () => {
    expect(compileModule(bits()).source).toBe(
      lines(
        "defmodule Bits do",
        "  require Bitwise",
        "  @compile {:nowarn_unused_function, [helper: 1]}",
        "",
        "  def mask(a), do: Bitwise.band(a, 255)",
        "",
        "  defp helper(_x), do: 0",
        "end"
      )
    );
  });

  it("skips disabled passes", () => {
    const { source } = compileModule(bits(), { passes: { "bitwise-import": false, "usage-hygiene": false } });
    expect(source).toBe(
      lines(
        "defmodule Bits do",
        "  @compile {:nowarn_unused_function, [helper: 1]}",
        "",
        "  def mask(a), do: Bitwise.band(a, 255)",
        "",
        "  defp helper(x), do: 0",
        "end"
      )
    );
  });

  it("prints with the configured indentation", () => {
    const { source } = compileModule(bits(), { indent: "    " });
    expect(source.split("\n")[1]).toBe("    require Bitwise");
  });

  it("names loop helpers per unit", () => {
    const loop = eModule("Spin", [eDef("go", [], eWhile(eVar("running"), eCall("tick", [])))]);
    const first = compileModule(loop).source;
    const second = compileModule(loop).source;
    expect(first.split("\n")[3]).toBe("      loop_1 = fn loop_1 ->");
    expect(second).toBe(first);
  });

  it("logs the unit it lowers", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    compileModule(bits(), { logger: new Logger({ level: "info" }) });
    expect(info).toHaveBeenCalledWith("[compile] lowering module Bits");
  });
});
