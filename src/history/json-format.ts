import type { Painter } from "../utils/ansi.js";
import type { JsonValue } from "./types.js";

const INDENT = "  ";

/**
 * Pretty-print a JSON value with two-space indentation. With a no-op painter
 * the output matches `JSON.stringify(value, null, 2)`.
 */
export function formatJson(value: JsonValue, paint: Painter, depth = 0): string {
  if (value === null) return paint("jsonNull", "null");
  if (typeof value === "string") return paint("jsonString", JSON.stringify(value));
  if (typeof value === "number" || typeof value === "boolean") {
    return paint("jsonScalar", JSON.stringify(value));
  }

  const pad = INDENT.repeat(depth + 1);
  const closePad = INDENT.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return paint("jsonPunct", "[]");
    const items = value.map((item) => pad + formatJson(item, paint, depth + 1));
    return (
      paint("jsonPunct", "[") +
      "\n" +
      items.join(paint("jsonPunct", ",") + "\n") +
      "\n" +
      closePad +
      paint("jsonPunct", "]")
    );
  }

  const keys = Object.keys(value);
  if (keys.length === 0) return paint("jsonPunct", "{}");
  const members = keys.map(
    (key) =>
      pad +
      paint("jsonKey", JSON.stringify(key)) +
      paint("jsonPunct", ":") +
      " " +
      formatJson(value[key], paint, depth + 1),
  );
  return (
    paint("jsonPunct", "{") +
    "\n" +
    members.join(paint("jsonPunct", ",") + "\n") +
    "\n" +
    closePad +
    paint("jsonPunct", "}")
  );
}
