import type { Value } from "./value";

function hex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b.toString(16).padStart(2, "0");
  }
  return out;
}

function formatFloat(x: number): string {
  if (Object.is(x, -0)) {
    return "-0.0";
  }
  const text = String(x);
  // Keep integral floats distinguishable from ints.
  if (Number.isInteger(x) && !text.includes("e")) {
    return `${text}.0`;
  }
  return text;
}

/**
 * Renders a value as single-line text for diagnostics.
 *
 * @example
 * ```typescript
 * format(mapOf([str("a"), array([int(1), float(2), nil()])]));
 * // {"a": [1, 2.0, nil]}
 * ```
 */
export function format(v: Value): string {
  switch (v.kind) {
    case "nil":
      return "nil";
    case "boolean":
      return v.value ? "true" : "false";
    case "int":
      return v.value.toString();
    case "float":
      return formatFloat(v.value);
    case "string":
      return JSON.stringify(v.value);
    case "binary":
      return `bin:${hex(v.value)}`;
    case "extension":
      return `ext:${v.value.typeId}:${hex(v.value.data)}`;
    case "array":
      return `[${v.value.map(format).join(", ")}]`;
    case "map":
      return `{${v.value.map((e) => `${format(e.key)}: ${format(e.value)}`).join(", ")}}`;
  }
}
