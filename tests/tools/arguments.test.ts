import { validateToolArguments } from "../../src/tools/arguments.js";
import { ToolArgumentError } from "../../src/types/errors.js";
import type { IToolSpec } from "../../src/types/tool.js";

const spec: IToolSpec = {
  name: "resize",
  description: "Resize something",
  parameters: [
    { name: "path", type: "string", description: "", required: true },
    { name: "width", type: "integer", description: "", required: false },
    { name: "scale", type: "number", description: "", required: false },
    { name: "tags", type: "array", description: "", required: false },
    { name: "meta", type: "object", description: "", required: false },
    { name: "force", type: "boolean", description: "", required: false },
  ],
  requiresPermission: false,
  handler: async () => ({ success: true, output: "" }),
};

describe("validateToolArguments", () => {
  it("accepts well-typed arguments and ignores undeclared ones", () => {
    expect(() =>
      validateToolArguments(spec, {
        path: "a.png",
        width: 10,
        scale: 0.5,
        tags: ["x"],
        meta: { k: 1 },
        force: true,
        extra: "ignored",
      }),
    ).not.toThrow();
  });

  it("reports a missing required parameter", () => {
    expect(() => validateToolArguments(spec, {})).toThrow(
      new ToolArgumentError("resize", 'missing required parameter "path"'),
    );
  });

  it("treats null like an absent value", () => {
    expect(() => validateToolArguments(spec, { path: "a", width: null })).not.toThrow();
    expect(() => validateToolArguments(spec, { path: null })).toThrow(ToolArgumentError);
  });

  it.each([
    [{ path: 5 }, 'parameter "path" must be string, got number'],
    [{ path: "a", width: 1.5 }, 'parameter "width" must be integer, got number'],
    [{ path: "a", tags: "x" }, 'parameter "tags" must be array, got string'],
    [{ path: "a", meta: [1] }, 'parameter "meta" must be object, got array'],
    [{ path: "a", force: "yes" }, 'parameter "force" must be boolean, got string'],
  ])("rejects %j", (args, reason) => {
    expect(() => validateToolArguments(spec, args)).toThrow(`Invalid arguments for resize: ${reason}`);
  });
});
