import { formatArgument } from "../../src/ui/components/PermissionPrompt.js";

describe("formatArgument", () => {
  it("shows strings as-is and serializes other values", () => {
    expect(formatArgument("ls -la")).toBe("ls -la");
    expect(formatArgument({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(formatArgument(undefined)).toBe("undefined");
  });

  it("shortens long values", () => {
    expect(formatArgument("x".repeat(205))).toBe(`${"x".repeat(200)}...`);
  });
});
