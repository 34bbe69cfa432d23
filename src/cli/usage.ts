import { DEFAULT_MODEL } from "../config.js";

export const KNOWN_MODELS: ReadonlyArray<{ name: string; description: string }> = [
  { name: "gemini-1.5-pro", description: "Most capable model" },
  { name: "gemini-1.5-flash", description: "Faster, more efficient model" },
  { name: "gemini-1.0-pro", description: "Legacy model" },
];

export function formatModelList(defaultModel: string = DEFAULT_MODEL): string {
  const lines = ["Available models:"];
  for (const model of KNOWN_MODELS) {
    const note = model.name === defaultModel ? " (default)" : "";
    lines.push(`  ${model.name.padEnd(18)} - ${model.description}${note}`);
  }
  return lines.join("\n");
}

export function formatUsageText(configFile: string): string {
  return `
promptlog — send a prompt to Gemini and keep a local history

Usage:
  promptlog [options] "your prompt"

Options:
  -m, --model <name>   Model to use for this request
  -l, --list-models    List known models
  -v, --view-log       Show conversation history (newest first)
  -c, --clear-log      Clear conversation history
  -h, --help           Show this help

Configuration:
  ${configFile}
  API_KEY="..."        required for sending prompts (or GEMINI_API_KEY)
  MODEL, ENDPOINT, LOG_FILE, MIRROR_DIR, TIMEOUT_MS are optional
`;
}

export function formatSetupHint(configFile: string): string {
  return [
    `Please create the config file with your API key:`,
    `  mkdir -p "$(dirname ${configFile})"`,
    `  echo 'API_KEY="YOUR_API_KEY"' > ${configFile}`,
    `  chmod 600 ${configFile}`,
  ].join("\n");
}
