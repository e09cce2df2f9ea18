import { describe, it, expect } from "vitest";
import { matchingIndexes, toggleIndex, type FilterChoice } from "./select.js";

const choices: FilterChoice[] = [
  { name: "chrome", label: "150     chrome" },
  { name: "bash", label: "200     bash" },
  { name: "Chrome Helper", label: "300     Chrome Helper" },
  { name: "node", label: "400     node" },
];

describe("matchingIndexes", () => {
  it("keeps every choice for an empty filter", () => {
    expect(matchingIndexes(choices, "")).toEqual([0, 1, 2, 3]);
  });

  it("matches the name case-insensitively", () => {
    expect(matchingIndexes(choices, "CHROME")).toEqual([0, 2]);
    expect(matchingIndexes(choices, "helper")).toEqual([2]);
  });

  it("ignores text that only appears in the label", () => {
    expect(matchingIndexes(choices, "150")).toEqual([]);
  });

  it("narrows as the filter grows", () => {
    expect(matchingIndexes(choices, "o")).toEqual([0, 2, 3]);
    expect(matchingIndexes(choices, "od")).toEqual([3]);
    expect(matchingIndexes(choices, "odx")).toEqual([]);
  });
});

describe("toggleIndex", () => {
  it("adds and removes an index without touching the input", () => {
    const empty = new Set<number>();

    const once = toggleIndex(empty, 2);
    const twice = toggleIndex(once, 2);

    expect([...once]).toEqual([2]);
    expect(twice.size).toBe(0);
    expect(empty.size).toBe(0);
  });
});
