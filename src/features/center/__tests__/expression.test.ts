import { describe, expect, it } from "vitest";
import {
  buildIdIndex,
  evaluateCenter,
  evaluateExpression,
  parseExpression,
} from "@/features/center/expression";
import { ExpressionError } from "@/types/errors";
import { makeDataset } from "@/features/dataset/__tests__/fixtures";

const ds = makeDataset([
  [1, 2, 3],
  [5, -1, 7],
  [10, 0, 0],
  [20, 4, 2],
]);

function errorCode(expr: string): string | null {
  try {
    evaluateCenter(expr, ds);
    return null;
  } catch (err) {
    return err instanceof ExpressionError ? err.code : "other";
  }
}

describe("parseExpression", () => {
  it("respects precedence", () => {
    expect(parseExpression("1 + 2 * 3")).toEqual({
      type: "binary",
      op: "+",
      at: 2,
      left: { type: "number", value: 1 },
      right: {
        type: "binary",
        op: "*",
        at: 6,
        left: { type: "number", value: 2 },
        right: { type: "number", value: 3 },
      },
    });
  });

  it("reads exponent literals", () => {
    expect(evaluateExpression("1e1 / 4", ds)).toEqual({ kind: "scalar", value: 2.5 });
  });
});

describe("evaluateCenter", () => {
  it("resolves pos(id) to the atom's x and y", () => {
    expect(evaluateCenter("pos(1)", ds)).toEqual([2, 3]);
  });

  it("averages positions", () => {
    expect(evaluateCenter("(pos(10) + pos(20)) / 2", ds)).toEqual([2, 1]);
  });

  it("broadcasts scalars and vector literals", () => {
    expect(evaluateCenter("2 * pos(1) - (1, 1)", ds)).toEqual([3, 5]);
    expect(evaluateCenter("-pos(5)", ds)).toEqual([1, -7]);
    expect(evaluateCenter("[1.5, 2.5, 9]", ds)).toEqual([1.5, 2.5]);
  });

  it("fails with UnknownAtomId for ids not in the dataset", () => {
    expect(errorCode("pos(9999)")).toBe("UnknownAtomId");
  });

  it("fails with InsufficientComponents for scalar results", () => {
    expect(errorCode("3")).toBe("InsufficientComponents");
  });

  it("fails with NonNumericResult for bad values", () => {
    expect(errorCode("pos(1) / 0")).toBe("NonNumericResult");
    expect(errorCode("pos(1.5)")).toBe("NonNumericResult");
    expect(errorCode("pos(pos(1))")).toBe("NonNumericResult");
    expect(errorCode("(1, 2) + (1, 2, 3)")).toBe("NonNumericResult");
    expect(errorCode("(pos(1), 2)")).toBe("NonNumericResult");
  });

  it("rejects names, attributes and calls other than pos", () => {
    expect(errorCode("abs(1)")).toBe("SyntaxError");
    expect(errorCode("x + 1")).toBe("SyntaxError");
    expect(errorCode("pos.x")).toBe("SyntaxError");
    expect(errorCode("__import__('os')")).toBe("SyntaxError");
  });

  it("rejects malformed input", () => {
    expect(errorCode("")).toBe("SyntaxError");
    expect(errorCode("pos(1")).toBe("SyntaxError");
    expect(errorCode("1 2")).toBe("SyntaxError");
    expect(errorCode("2 ** 3")).toBe("SyntaxError");
  });

  it("reports where parsing failed", () => {
    try {
      evaluateCenter("pos(1) + foo", ds);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ExpressionError);
      expect(err instanceof ExpressionError ? err.position : undefined).toBe(9);
    }
  });
});

describe("buildIdIndex", () => {
  it("is built once per dataset", () => {
    expect(buildIdIndex(ds)).toBe(buildIdIndex(ds));
    expect(buildIdIndex(ds).get(20)).toBe(3);
  });

  it("maps duplicate ids to their last index", () => {
    const dup = makeDataset([
      [1, 0, 0],
      [1, 5, 5],
    ]);
    expect(evaluateCenter("pos(1)", dup)).toEqual([5, 5]);
  });
});
