import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

export const DEFAULT_MODEL = "gemini-1.5-pro";
export const DEFAULT_ENDPOINT = "https://generativelanguage.googleapis.com/v1beta/models";

export interface PromptlogConfig {
	/** Where settings were read from, if the file existed */
	config_file: string;
	default_model: string;

	api: {
		endpoint: string;
		api_key?: string;
		/** 0 disables the timeout */
		timeout_ms: number;
	};

	history: {
		file: string;
		/** Directory the log is copied into after every append */
		mirror_dir?: string;
	};
}

/**
 * The settings file holds shell-style assignments, e.g.
 *   API_KEY="..."
 *   MODEL=gemini-1.5-flash
 */
const FileSettingsSchema = z.object({
	API_KEY: z.string().min(1).optional(),
	MODEL: z.string().min(1).optional(),
	ENDPOINT: z.string().url().optional(),
	LOG_FILE: z.string().min(1).optional(),
	MIRROR_DIR: z.string().min(1).optional(),
	TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
});

type FileSettings = z.infer<typeof FileSettingsSchema>;

export interface LoadConfigOptions {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
	homeDir?: string;
}

export function defaultConfigDir(home: string = homedir()): string {
	return join(home, ".config", "gemini");
}

export function loadConfig(options: LoadConfigOptions = {}): PromptlogConfig {
	const env = options.env ?? process.env;
	const configDir = defaultConfigDir(options.homeDir);
	const configFile = resolve(
		expandHome(options.configPath ?? env.PROMPTLOG_CONFIG ?? join(configDir, "config"), options.homeDir),
	);

	const settings = readSettings(configFile);

	const config: PromptlogConfig = {
		config_file: configFile,
		default_model: settings.MODEL ?? DEFAULT_MODEL,
		api: {
			endpoint: settings.ENDPOINT ?? DEFAULT_ENDPOINT,
			api_key: settings.API_KEY,
			timeout_ms: settings.TIMEOUT_MS ?? 60_000,
		},
		history: {
			file: settings.LOG_FILE ?? join(configDir, "conversation_history.json"),
			mirror_dir: settings.MIRROR_DIR,
		},
	};

	// Environment wins over the settings file
	if (env.GEMINI_API_KEY) {
		config.api.api_key = env.GEMINI_API_KEY;
	}
	if (env.PROMPTLOG_MODEL) {
		config.default_model = env.PROMPTLOG_MODEL;
	}
	if (env.PROMPTLOG_LOG_FILE) {
		config.history.file = env.PROMPTLOG_LOG_FILE;
	}

	config.history.file = resolve(expandHome(config.history.file, options.homeDir));
	if (config.history.mirror_dir) {
		config.history.mirror_dir = resolve(expandHome(config.history.mirror_dir, options.homeDir));
	}

	return config;
}

/** The API key, or a ConfigError explaining how to provide one. */
export function requireApiKey(config: PromptlogConfig): string {
	if (config.api.api_key) return config.api.api_key;
	throw new ConfigError(`No API key found in ${config.config_file} or GEMINI_API_KEY`);
}

function readSettings(file: string): FileSettings {
	if (!existsSync(file)) return {};

	let raw: Record<string, string>;
	try {
		raw = parse(readFileSync(file, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to read config file ${file}`, err);
	}

	const result = FileSettingsSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new ConfigError(`Invalid config file ${file}: ${issues}`, result.error);
	}
	return result.data;
}

function expandHome(p: string, home: string = homedir()): string {
	if (p === "~") return home;
	if (p.startsWith("~/")) return join(home, p.slice(2));
	return p;
}
