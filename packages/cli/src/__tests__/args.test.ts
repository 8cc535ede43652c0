import { describe, expect, it } from "vitest";
import { parseArgs, stringFlag } from "../args.js";

describe("parseArgs", () => {
  it("collects positionals, value flags and boolean flags", () => {
    const parsed = parseArgs(["./agent", "--port", "8080", "--dev", "--executor=./run.mjs"]);
    if ("error" in parsed) {
      throw new Error(parsed.error);
    }
    expect(parsed.positionals).toEqual(["./agent"]);
    expect(stringFlag(parsed, "--port")).toBe("8080");
    expect(stringFlag(parsed, "--executor")).toBe("./run.mjs");
    expect(parsed.flags.get("--dev")).toBe(true);
    expect(stringFlag(parsed, "--dev")).toBeUndefined();
  });

  it("keeps equals signs inside inline values", () => {
    const parsed = parseArgs(["--token=abc=def"]);
    expect("error" in parsed ? parsed.error : stringFlag(parsed, "--token")).toBe("abc=def");
  });

  it("reports unknown options and missing values", () => {
    expect(parseArgs(["--verbose"])).toEqual({ error: "Unknown option: --verbose" });
    expect(parseArgs(["--port"])).toEqual({ error: "Missing value for --port" });
    expect(parseArgs(["--token="])).toEqual({ error: "Missing value for --token" });
  });
});
