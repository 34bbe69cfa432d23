const STYLES = {
  bold: "1",
  dim: "0;90",
  plain: "0;37",
  bright: "1;37",
  red: "1;31",
  green: "1;32",
  yellow: "1;33",
  blue: "1;34",
  magenta: "1;35",
  cyan: "1;36",
  jsonNull: "1;30",
  jsonScalar: "0;39",
  jsonString: "0;32",
  jsonKey: "34;1",
  jsonPunct: "1;39",
} as const;

export type Style = keyof typeof STYLES;

export type Painter = (style: Style, text: string) => string;

/** Returns a painter that wraps text in ANSI escapes, or leaves it alone. */
export function createPainter(enabled: boolean): Painter {
  if (!enabled) return (_style, text) => text;
  return (style, text) => `\x1b[${STYLES[style]}m${text}\x1b[0m`;
}

/** Color is on for a TTY unless NO_COLOR is set. */
export function shouldUseColor(stream: { isTTY?: boolean }): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false;
  return stream.isTTY === true;
}
