import { parseArguments, runCli, USAGE } from "../src/cli.js";
import { createHarness } from "./support/context.js";

describe("parseArguments", () => {
  it("requires a command", () => {
    expect(() => parseArguments([])).toThrow(/No command specified/);
  });

  it("rejects unknown commands", () => {
    expect(() => parseArguments(["push"])).toThrow("Unknown command: push");
  });

  it("parses send with its positionals", () => {
    expect(parseArguments(["send", "a.txt", "acme/site:docs/"])).toEqual({
      command: "send",
      file: "a.txt",
      target: "acme/site:docs/",
      options: { branch: undefined, message: undefined },
    });
  });

  it("leaves missing positionals for the handler to report", () => {
    expect(parseArguments(["copy", "./dist"])).toEqual({
      command: "copy",
      source: "./dist",
      destination: undefined,
      options: { branch: undefined, message: undefined },
    });
  });

  it("accepts the --branch=feature option", () => {
    const options = parseArguments(["rm", "--branch=feature", "acme/site:a.txt"]);
    expect(options).toEqual({
      command: "rm",
      target: "acme/site:a.txt",
      options: { branch: "feature", message: undefined },
    });
  });

  it("accepts the -b feature shorthand", () => {
    expect(parseArguments(["ls", "-b", "feature", "acme/site"])).toEqual({
      command: "ls",
      target: "acme/site",
      options: { branch: "feature" },
    });
  });

  it("accepts the --message syntax", () => {
    const options = parseArguments(["send", "a.txt", "acme/site", "--message", "Ship it"]);
    expect(options.command === "send" && options.options.message).toBe("Ship it");
  });

  it("requires a value for --branch", () => {
    expect(() => parseArguments(["ls", "--branch"])).toThrow(/Missing value for --branch/);
  });

  it("rejects a blank branch name", () => {
    expect(() => parseArguments(["ls", "-b", "  "])).toThrow("Branch name cannot be empty");
  });

  it("rejects options the command does not take", () => {
    expect(() => parseArguments(["ls", "-m", "note"])).toThrow(
      "Option --message is not supported by ls"
    );
    expect(() => parseArguments(["login", "-b", "dev"])).toThrow(
      "Option --branch is not supported by login"
    );
  });

  it("rejects extra positionals", () => {
    expect(() => parseArguments(["rm", "acme/site:a", "acme/site:b"])).toThrow(
      "Unexpected argument: acme/site:b"
    );
  });

  it("rejects unknown flags", () => {
    expect(() => parseArguments(["ls", "--unknown"])).toThrow(/Unknown option/);
  });

  it("treats :. as a positional", () => {
    expect(parseArguments(["ls", ":."])).toEqual({
      command: "ls",
      target: ":.",
      options: { branch: undefined },
    });
  });

  it("recognises help and version anywhere", () => {
    expect(parseArguments(["send", "--help"])).toEqual({ command: "help" });
    expect(parseArguments(["-v"])).toEqual({ command: "version" });
  });
});

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const harness = await createHarness();
    try {
      await expect(runCli(["--help"], harness.context)).resolves.toBe(0);
      expect(harness.stdout).toEqual([USAGE]);
    } finally {
      await harness.cleanup();
    }
  });

  it("reports argument errors with exit status 1", async () => {
    const harness = await createHarness();
    try {
      await expect(runCli([], harness.context)).resolves.toBe(1);
      expect(harness.stderr).toEqual([
        "gitup ERR! No command specified",
        "Available commands: login, send, copy, rm, ls",
        "Use 'gitup --help' for more information",
      ]);
    } finally {
      await harness.cleanup();
    }
  });

  it("reports unexpected failures", async () => {
    const harness = await createHarness();
    jest.spyOn(harness.api, "listRepositories").mockRejectedValueOnce(new TypeError("bad data"));
    try {
      await expect(runCli(["ls"], harness.context)).resolves.toBe(1);
      expect(harness.stderr).toEqual(["gitup ERR! Unexpected error: bad data"]);
    } finally {
      await harness.cleanup();
    }
  });
});
