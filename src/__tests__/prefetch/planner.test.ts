import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { InvariantViolation } from "../../internal/invariant";
import { nextRequestForView, shouldLoadRange } from "../../prefetch";
import { SparseArray, SparseRangeError, type IndexRange } from "../../sparse";

const sequence = (start: number, end: number): number[] =>
  Array.from({ length: end - start }, (_, index) => start + index);

const plan = (container: SparseArray<number>, view: IndexRange): IndexRange | null =>
  Option.getOrNull(nextRequestForView(container, view));

describe("prefetch planner", () => {
  it("requests nothing for an empty view", () => {
    const container = SparseArray.withLength<number>(20);

    expect(plan(container, { start: 0, end: 0 })).toBeNull();
    expect(plan(container, { start: 7, end: 7 })).toBeNull();
  });

  it("requests half a view after a view at the start", () => {
    expect(plan(SparseArray.withLength<number>(20), { start: 0, end: 10 })).toEqual({ start: 0, end: 15 });
  });

  it("requests half a view before a view at the end", () => {
    expect(plan(SparseArray.withLength<number>(20), { start: 10, end: 20 })).toEqual({
      start: 5,
      end: 20,
    });
  });

  it("requests half a view on either side", () => {
    expect(plan(SparseArray.withLength<number>(100), { start: 10, end: 20 })).toEqual({
      start: 5,
      end: 25,
    });
  });

  it("requests the whole container for a view covering it", () => {
    expect(plan(SparseArray.withLength<number>(20), { start: 0, end: 20 })).toEqual({ start: 0, end: 20 });
  });

  it("requests only the missing half after loaded data", () => {
    const container = SparseArray.withLength<number>(20);
    container.insert(0, sequence(0, 10));

    expect(plan(container, { start: 0, end: 10 })).toEqual({ start: 10, end: 15 });
  });

  it("requests only the missing half before loaded data", () => {
    const container = SparseArray.withLength<number>(20);
    container.insert(10, sequence(10, 20));

    expect(plan(container, { start: 10, end: 20 })).toEqual({ start: 5, end: 10 });
  });

  it("requests nothing when the window is fully populated", () => {
    const container = SparseArray.from(sequence(0, 20));

    expect(plan(container, { start: 5, end: 10 })).toBeNull();
  });

  it("uses integer division for odd view lengths", () => {
    expect(plan(SparseArray.withLength<number>(100), { start: 10, end: 17 })).toEqual({
      start: 7,
      end: 20,
    });
  });

  it("prefers the earliest of equally long gaps", () => {
    const container = SparseArray.withLength<number>(20);
    container.insert(0, sequence(0, 3));
    container.insert(6, sequence(6, 10));
    container.insert(13, sequence(13, 20));

    expect(plan(container, { start: 5, end: 15 })).toEqual({ start: 3, end: 6 });
  });

  it("prefers a strictly longer later gap", () => {
    const container = SparseArray.withLength<number>(20);
    container.insert(0, sequence(0, 3));
    container.insert(5, sequence(5, 10));
    container.insert(13, sequence(13, 20));

    expect(plan(container, { start: 5, end: 15 })).toEqual({ start: 10, end: 13 });
  });

  it("closes a gap that runs to the end of the window at the window end", () => {
    const container = SparseArray.withLength<number>(30);
    container.insert(5, sequence(5, 22));

    expect(plan(container, { start: 10, end: 20 })).toEqual({ start: 22, end: 25 });
  });

  it("never reports a gap again once it has been filled", () => {
    const container = SparseArray.withLength<number>(20);
    container.insert(0, sequence(0, 3));
    container.insert(6, sequence(6, 10));
    container.insert(13, sequence(13, 20));
    const view = { start: 5, end: 15 };

    expect(plan(container, view)).toEqual({ start: 3, end: 6 });
    container.insert(3, sequence(3, 6));
    expect(plan(container, view)).toEqual({ start: 10, end: 13 });
    container.insert(10, sequence(10, 13));
    expect(plan(container, view)).toBeNull();
  });

  it("widens the window by the configured ratio", () => {
    const container = SparseArray.withLength<number>(20);

    expect(
      Option.getOrNull(nextRequestForView(container, { start: 5, end: 10 }, { extraLoadRatio: 0 })),
    ).toEqual({ start: 5, end: 10 });
    expect(
      Option.getOrNull(nextRequestForView(container, { start: 5, end: 10 }, { extraLoadRatio: 1 })),
    ).toEqual({ start: 0, end: 15 });
  });

  it("treats excluded ranges as populated", () => {
    const container = SparseArray.withLength<number>(20);
    const view = { start: 0, end: 10 };

    expect(
      Option.getOrNull(nextRequestForView(container, view, { exclude: [{ start: 0, end: 15 }] })),
    ).toBeNull();
    expect(
      Option.getOrNull(nextRequestForView(container, view, { exclude: [{ start: 5, end: 8 }] })),
    ).toEqual({ start: 8, end: 15 });
    expect(
      Option.getOrNull(
        nextRequestForView(container, view, {
          exclude: [
            { start: 12, end: 15 },
            { start: 0, end: 0 },
            { start: 2, end: 4 },
          ],
        }),
      ),
    ).toEqual({ start: 4, end: 12 });
  });

  it("treats nested and overlapping excluded ranges given in any order as populated", () => {
    const container = SparseArray.withLength<number>(20);
    const view = { start: 0, end: 20 };

    expect(
      Option.getOrNull(
        nextRequestForView(container, view, {
          exclude: [
            { start: 0, end: 10 },
            { start: 2, end: 4 },
          ],
        }),
      ),
    ).toEqual({ start: 10, end: 20 });
    expect(
      Option.getOrNull(
        nextRequestForView(container, view, {
          exclude: [
            { start: 2, end: 4 },
            { start: 8, end: 14 },
            { start: 0, end: 10 },
          ],
        }),
      ),
    ).toEqual({ start: 14, end: 20 });
  });

  it("rejects negative and non-finite load ratios", () => {
    const container = SparseArray.withLength<number>(20);
    const view = { start: 5, end: 10 };

    expect(() => nextRequestForView(container, view, { extraLoadRatio: -1 })).toThrow(
      "extraLoadRatio must be a finite number >= 0, received -1",
    );
    expect(() => nextRequestForView(container, view, { extraLoadRatio: Number.NaN })).toThrow(
      InvariantViolation,
    );
    expect(() => shouldLoadRange(view, 20, { extraLoadRatio: Number.POSITIVE_INFINITY })).toThrow(
      "extraLoadRatio must be a finite number >= 0, received Infinity",
    );
  });

  it("rejects views outside the container", () => {
    const container = SparseArray.withLength<number>(20);

    expect(() => nextRequestForView(container, { start: 15, end: 25 })).toThrow(SparseRangeError);
    expect(() => nextRequestForView(container, { start: -2, end: 4 })).toThrow(SparseRangeError);
  });

  describe("should-load window", () => {
    it("clamps to both container bounds", () => {
      expect(shouldLoadRange({ start: 10, end: 20 }, 100)).toEqual({ start: 5, end: 25 });
      expect(shouldLoadRange({ start: 0, end: 10 }, 20)).toEqual({ start: 0, end: 15 });
      expect(shouldLoadRange({ start: 10, end: 20 }, 20)).toEqual({ start: 5, end: 20 });
      expect(shouldLoadRange({ start: 0, end: 20 }, 20)).toEqual({ start: 0, end: 20 });
    });
  });
});
