/** Variables every kernel tool invocation needs */
export const DEFAULT_ENVIRONMENT: Readonly<Record<string, string>> = {
  ARCH: "arm64",
  ANDROID_MAJOR_VERSION: "q",
};

/**
 * Set each variable the caller has not already set. Caller values win.
 * Returns `KEY = value` lines for display, in `defaults` order.
 */
export function setupEnvironment(
  defaults: Readonly<Record<string, string>>,
  env: NodeJS.ProcessEnv
): string[] {
  const lines: string[] = [];
  for (const [key, fallback] of Object.entries(defaults)) {
    const value = env[key] ?? fallback;
    env[key] = value;
    lines.push(`${key} = ${value}`);
  }
  return lines;
}
