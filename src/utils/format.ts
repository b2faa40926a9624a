import { inspect } from "node:util";

/**
 * Renders any key or argument for a message. Never throws: objects go
 * through `inspect`, which does not call their `toString`.
 */
export const formatValue = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value !== "object" && typeof value !== "function") {
    return String(value);
  }
  try {
    return inspect(value, { depth: 2, breakLength: Number.POSITIVE_INFINITY });
  } catch {
    return "[unprintable value]";
  }
};
