export type Command =
  | { kind: "prompt"; prompt: string; model?: string }
  | { kind: "view-log" }
  | { kind: "clear-log" }
  | { kind: "list-models" }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

/**
 * Parse argv (without the node and script entries). Arguments are taken in
 * order: the first action flag decides the command, and any other
 * argument is the prompt, the last one winning.
 */
export function parseArgs(argv: string[]): Command {
  let model: string | undefined;
  let prompt: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-m":
      case "--model": {
        const value = argv[i + 1];
        if (value === undefined || value === "") {
          return { kind: "invalid", message: `Error: ${arg} requires a model name` };
        }
        model = value;
        i++;
        break;
      }
      case "-l":
      case "--list-models":
        return { kind: "list-models" };
      case "-c":
      case "--clear-log":
        return { kind: "clear-log" };
      case "-v":
      case "--view-log":
        return { kind: "view-log" };
      case "-h":
      case "--help":
        return { kind: "help" };
      default:
        prompt = arg;
        break;
    }
  }

  if (!prompt) {
    return { kind: "invalid", message: "Error: No prompt provided" };
  }
  return model === undefined ? { kind: "prompt", prompt } : { kind: "prompt", prompt, model };
}
