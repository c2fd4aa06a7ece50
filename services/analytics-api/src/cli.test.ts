import { describe, it, expect } from "vitest";
import { parseArgs } from "./cli.js";

describe("parseArgs", () => {
  it("defaults to help", () => {
    expect(parseArgs([]).command).toBe("help");
  });

  it("joins the words of a question", () => {
    const args = parseArgs(["ask", "какое", "видео", "лучше?", "-c", "@chan"]);

    expect(args.command).toBe("ask");
    expect(args.positional).toBe("какое видео лучше?");
    expect(args.options.channel).toBe("@chan");
  });

  it("reads sync options", () => {
    expect(parseArgs(["sync", "@chan", "--count", "10", "--json", "-v"])).toEqual({
      command: "sync",
      positional: "@chan",
      options: { count: 10, json: true, verbose: true },
    });
  });

  it("ignores invalid numbers", () => {
    expect(parseArgs(["serve", "--port", "abc"]).options.port).toBeUndefined();
  });

  it("treats command names after the command as words", () => {
    expect(parseArgs(["ask", "help", "me"]).positional).toBe("help me");
  });
});
