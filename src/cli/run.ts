import { GeminiClient, type GenerateContentClient } from "../api/client.js";
import { loadConfig, requireApiKey, type LoadConfigOptions, type PromptlogConfig } from "../config.js";
import { renderHistory } from "../history/renderer.js";
import { HistoryStore } from "../history/store.js";
import { runPrompt, type SessionOutput } from "../session/driver.js";
import { createPainter } from "../utils/ansi.js";
import { ConfigError } from "../utils/errors.js";
import { parseArgs } from "./args.js";
import { formatModelList, formatSetupHint, formatUsageText } from "./usage.js";

export interface CliContext {
  output: SessionOutput;
  color: boolean;
  config?: LoadConfigOptions;
  /** Builds the API client; defaults to the HTTP client */
  createClient?: (config: PromptlogConfig, apiKey: string) => GenerateContentClient;
}

/** Dispatch one invocation and resolve with its exit code. */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const { output } = ctx;
  const command = parseArgs(argv);

  let config: PromptlogConfig;
  try {
    config = loadConfig(ctx.config);
  } catch (err) {
    if (err instanceof ConfigError) {
      output.printError(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      output.print(formatUsageText(config.config_file));
      return 0;
    case "list-models":
      output.print(formatModelList(config.default_model));
      return 0;
    case "invalid":
      output.printError(command.message);
      output.print(formatUsageText(config.config_file));
      return 1;
  }

  const store = new HistoryStore({
    filePath: config.history.file,
    mirrorDir: config.history.mirror_dir,
  });
  await store.initialize();

  switch (command.kind) {
    case "view-log":
      output.print(renderHistory(await store.load(), { color: ctx.color }));
      return 0;
    case "clear-log":
      await store.clear();
      output.print("Conversation history cleared.");
      return 0;
    case "prompt": {
      let apiKey: string;
      try {
        apiKey = requireApiKey(config);
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        output.printError(`Error: ${err.message}`);
        output.printError(formatSetupHint(config.config_file));
        return 1;
      }

      const client = ctx.createClient
        ? ctx.createClient(config, apiKey)
        : new GeminiClient({
            endpoint: config.api.endpoint,
            apiKey,
            timeoutMs: config.api.timeout_ms,
          });
      return runPrompt(
        { client, store, output, paint: createPainter(ctx.color) },
        command.model ?? config.default_model,
        command.prompt,
      );
    }
  }
}
