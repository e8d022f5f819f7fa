/** Static config wins over the CLI, the CLI over the default; only null/undefined count as unset. */
export function resolveValue<T>(configValue: T | null | undefined, cliValue: T | null | undefined): T | undefined;
export function resolveValue<T>(configValue: T | null | undefined, cliValue: T | null | undefined, defaultValue: T): T;
export function resolveValue<T>(
  configValue: T | null | undefined,
  cliValue: T | null | undefined,
  defaultValue?: T,
): T | undefined {
  if (configValue !== null && configValue !== undefined) return configValue;
  if (cliValue !== null && cliValue !== undefined) return cliValue;
  return defaultValue;
}
