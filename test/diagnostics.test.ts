/**
 * Tests for errors, logging and fresh names.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { ErrorCodes, InternalCompilerError, LoweringError } from "../src/errors";
import { FreshNames } from "../src/fresh-names";
import { Logger, silentLogger } from "../src/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("errors", () => {
  it("collects notes", () => {
    const error = new LoweringError(ErrorCodes.InvalidInput, "bad", "input").addNote("first").addNote("second");
    expect(error.notes).toEqual([{ message: "first" }, { message: "second" }]);
    expect(error.name).toBe("LoweringError");
  });

  it("builds internal errors", () => {
    const defect = InternalCompilerError.extractionDefect("array-loop", "while");
    expect(defect).toBeInstanceOf(LoweringError);
    expect(defect.name).toBe("InternalCompilerError");
    expect(defect.message).toBe("array-loop: predicate matched but extraction failed on while");

    const unhandled = InternalCompilerError.unhandledNode("print", "call foo/1");
    expect(unhandled.code).toBe(ErrorCodes.UnhandledNode);
    expect(unhandled.stage).toBe("print");
    expect(unhandled.message).toBe("Unhandled node shape: call foo/1");
  });
});

describe("Logger", () => {
  it("nests namespaces", () => {
    expect(new Logger({ namespace: "a" }).child("b").namespace).toBe("a:b");
    expect(new Logger().child("b").namespace).toBe("b");
  });

  it("filters by level", () => {
    const logger = new Logger();
    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("warn")).toBe(true);
    expect(logger.isEnabled("error")).toBe(true);
    expect(silentLogger.isEnabled("error")).toBe(false);
  });

  it("prefixes messages with the namespace", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new Logger({ namespace: "lowering" });
    logger.warn("careful");
    logger.debug("hidden");
    expect(warn).toHaveBeenCalledWith("[lowering] careful");
    expect(debug).not.toHaveBeenCalled();
  });
});

describe("FreshNames", () => {
  it("counts across prefixes", () => {
    const names = new FreshNames();
    expect(names.next("loop")).toBe("loop_1");
    expect(names.next("loop")).toBe("loop_2");
    expect(names.next("idx")).toBe("idx_3");
    expect(names.count).toBe(3);
  });
});
