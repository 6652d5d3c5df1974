export type EnvSource = Record<string, string | undefined>;

export function parsePositiveInt(envVar: string, defaultValue: number, minValue = 1, env: EnvSource = process.env): number {
  const value = env[envVar];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < minValue) {
    throw new Error(`Invalid ${envVar}: "${value}". Must be an integer >= ${minValue}. Default is ${defaultValue}.`);
  }
  return parsed;
}
