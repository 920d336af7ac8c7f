import { resolve } from "node:path";
import { InvalidArgumentError } from "commander";
import { collect, parsePositiveInt, resolveProjectRoot } from "../../src/cli/flags.js";

describe("collect", () => {
  it("accumulates repeated values", () => {
    expect(collect("b=2", collect("a=1", []))).toEqual(["a=1", "b=2"]);
  });
});

describe("parsePositiveInt", () => {
  it("parses positive integers", () => {
    expect(parsePositiveInt("12")).toBe(12);
  });

  it.each(["0", "-1", "1.5", "ten"])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("resolveProjectRoot", () => {
  it("resolves an explicit project root", () => {
    expect(resolveProjectRoot({ projectRoot: "some/dir" })).toBe(resolve("some/dir"));
  });
});
