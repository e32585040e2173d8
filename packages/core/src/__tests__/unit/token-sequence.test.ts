import { describe, expect, it } from "vitest";
import { TokenSequence } from "../../index.js";

describe("TokenSequence", () => {
  it("copies its input", () => {
    const args = ["--count", "1"];
    const tokens = new TokenSequence(args);
    args.push("extra");

    expect(tokens.toArray()).toEqual(["--count", "1"]);
    expect(tokens.length).toBe(2);
  });

  it("finds tokens by value", () => {
    const tokens = new TokenSequence(["a", "b", "a"]);

    expect(tokens.indexOf("a")).toBe(0);
    expect(tokens.indexOf("b")).toBe(1);
    expect(tokens.indexOf("c")).toBeUndefined();
  });

  it("reads by position", () => {
    const tokens = new TokenSequence(["a", "b"]);

    expect(tokens.at(1)).toBe("b");
    expect(tokens.at(2)).toBeUndefined();
  });

  it("removes a run of tokens into a new sequence", () => {
    const tokens = new TokenSequence(["x", "--count", "1", "y"]);
    const rest = tokens.without(1, 2);

    expect(rest.toArray()).toEqual(["x", "y"]);
    expect(tokens.toArray()).toEqual(["x", "--count", "1", "y"]);
  });

  it("hands out copies", () => {
    const tokens = new TokenSequence(["a"]);
    tokens.toArray().push("b");

    expect(tokens.toArray()).toEqual(["a"]);
  });
});
