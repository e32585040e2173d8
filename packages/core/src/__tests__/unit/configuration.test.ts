import { spyOnWarnings } from "@flagcraft/test-utils";
import { afterEach, beforeEach, describe, expect, it, type MockInstance } from "vitest";
import { DEFAULT_REST_FIELD, FlagConfiguration } from "../../index.js";

describe("FlagConfiguration", () => {
  let warn: MockInstance;

  beforeEach(() => {
    warn = spyOnWarnings();
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it("starts empty with the default rest field", () => {
    const config = FlagConfiguration.empty();

    expect(config.shortFor("verbose")).toBeUndefined();
    expect(config.description()).toBeUndefined();
    expect(config.restFieldName()).toBe(DEFAULT_REST_FIELD);
    expect(DEFAULT_REST_FIELD).toBe("rest");
    expect(config.shortAliases()).toEqual([]);
  });

  it("returns a new configuration from every builder call", () => {
    const empty = FlagConfiguration.empty();
    const aliased = empty.short("verbose", "v");

    expect(aliased).not.toBe(empty);
    expect(empty.shortFor("verbose")).toBeUndefined();
    expect(aliased.shortFor("verbose")).toBe("v");
  });

  it("reflects the last value per key regardless of call order", () => {
    const a = FlagConfiguration.empty()
      .short("verbose", "v")
      .desc("first")
      .restField("files")
      .desc("Compile the given files");
    const b = FlagConfiguration.empty()
      .restField("files")
      .desc("Compile the given files")
      .short("verbose", "x")
      .short("verbose", "v");

    for (const config of [a, b]) {
      expect(config.shortFor("verbose")).toBe("v");
      expect(config.description()).toBe("Compile the given files");
      expect(config.restFieldName()).toBe("files");
    }
  });

  it("lists aliases in registration order", () => {
    const config = FlagConfiguration.empty().short("verbose", "v").short("color", "c");

    expect(config.shortAliases()).toEqual([
      ["verbose", "v"],
      ["color", "c"],
    ]);
  });

  it("warns when one alias is registered for two fields", () => {
    const config = FlagConfiguration.empty().short("verbose", "v").short("version", "v");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[flagcraft:config] alias -v is registered for both "verbose" and "version"',
    );
    expect(config.shortFor("verbose")).toBe("v");
    expect(config.shortFor("version")).toBe("v");
  });

  it("does not warn when a field re-registers its own alias", () => {
    FlagConfiguration.empty().short("verbose", "v").short("verbose", "v");

    expect(warn).not.toHaveBeenCalled();
  });

  it("warns about an alias that is not a single character", () => {
    const config = FlagConfiguration.empty().short("level", "ab").short("name", "");

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      '[flagcraft:config] alias "ab" for "level" is not a single character',
    );
    expect(warn).toHaveBeenNthCalledWith(
      2,
      '[flagcraft:config] alias "" for "name" is not a single character',
    );
    expect(config.shortFor("level")).toBe("ab");
  });

  it("accepts a single astral character as an alias without warning", () => {
    FlagConfiguration.empty().short("happy", "😀");

    expect(warn).not.toHaveBeenCalled();
  });
});
