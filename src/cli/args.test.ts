import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("takes a free argument as the prompt", () => {
    expect(parseArgs(["What is a monad?"])).toEqual({ kind: "prompt", prompt: "What is a monad?" });
  });

  it("reads the model option in either form", () => {
    expect(parseArgs(["-m", "gemini-1.5-flash", "hi"])).toEqual({
      kind: "prompt",
      prompt: "hi",
      model: "gemini-1.5-flash",
    });
    expect(parseArgs(["hi", "--model", "gemini-1.0-pro"])).toEqual({
      kind: "prompt",
      prompt: "hi",
      model: "gemini-1.0-pro",
    });
  });

  it("keeps the last free argument", () => {
    expect(parseArgs(["first", "second"])).toEqual({ kind: "prompt", prompt: "second" });
  });

  it.each<[string[], string]>([
    [["-v"], "view-log"],
    [["--view-log"], "view-log"],
    [["-c"], "clear-log"],
    [["--clear-log"], "clear-log"],
    [["-l"], "list-models"],
    [["--list-models"], "list-models"],
    [["-h"], "help"],
    [["--help"], "help"],
  ])("maps %j to %s", (argv, kind) => {
    expect(parseArgs(argv).kind).toBe(kind);
  });

  it("runs the first action flag it meets", () => {
    expect(parseArgs(["-v", "-c"])).toEqual({ kind: "view-log" });
    expect(parseArgs(["some prompt", "-c"])).toEqual({ kind: "clear-log" });
  });

  it("rejects a missing prompt", () => {
    expect(parseArgs([])).toEqual({ kind: "invalid", message: "Error: No prompt provided" });
    expect(parseArgs(["-m", "gemini-1.5-pro"])).toEqual({
      kind: "invalid",
      message: "Error: No prompt provided",
    });
  });

  it("rejects a model option without a value", () => {
    expect(parseArgs(["hi", "--model"])).toEqual({
      kind: "invalid",
      message: "Error: --model requires a model name",
    });
  });
});
