export type EnvSource = Record<string, string | undefined>;

export function getEnv(name: string, fallback?: string, env: EnvSource = process.env): string | undefined {
  const value = env[name];
  if (value == null || value.trim() === "") {
    return fallback;
  }
  return value.trim();
}
