import { inspect } from "node:util";

/**
 * Values that know how to present themselves in log output.
 */
export interface Describable {
  describe(): string;
}

function isDescribable(value: unknown): value is Describable {
  return (
    typeof value === "object" &&
    value !== null &&
    "describe" in value &&
    typeof value.describe === "function"
  );
}

export interface DescribeOptions {
  /** Keep the result on one line */
  compact?: boolean;
}

/**
 * Render a value for display. Strings pass through unquoted.
 */
export function describeValue(
  value: unknown,
  options: DescribeOptions = {}
): string {
  if (typeof value === "string") {
    return value;
  }
  if (isDescribable(value)) {
    return value.describe();
  }
  return inspect(value, {
    colors: false,
    depth: 4,
    breakLength: options.compact ? Number.POSITIVE_INFINITY : 80,
    sorted: true,
  });
}
