import { UsageError } from "./errors.js";

/** Format an error for stderr. Usage errors list their hints. */
export function renderError(error: unknown): string {
  if (error instanceof UsageError) {
    const lines = [error.message];
    if (error.hints.length > 0) {
      lines.push("", "How to fix:");
      for (const hint of error.hints) {
        lines.push(`  - ${hint}`);
      }
    }
    return lines.join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
