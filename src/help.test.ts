import { describe, expect, it } from "vitest";
import { SinnerdleError } from "./errors";
import { inDepthHelp } from "./help";

describe("inDepthHelp", () => {
  it("has a page per subcommand", () => {
    for (const cmd of ["gather", "play", "solve", "help"]) {
      expect(inDepthHelp(cmd).startsWith(`USAGE: sinnerdle ${cmd}`)).toBe(true);
    }
  });

  it("rejects unknown subcommands", () => {
    expect(() => inDepthHelp("dance")).toThrow(SinnerdleError);
    expect(() => inDepthHelp("dance")).toThrow("Unknown command: `dance`");
    expect(() => inDepthHelp("constructor")).toThrow("Unknown command: `constructor`");
    expect(() => inDepthHelp("toString")).toThrow(SinnerdleError);
  });
});
