export function readEnvValue(key: string): string | undefined {
  const value = process.env[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function setEnvValue(key: string, value: string): void {
  process.env[key] = value;
}

export function unsetEnvValue(key: string): void {
  delete process.env[key];
}

export function isEnvFlagSet(key: string): boolean {
  const value = readEnvValue(key);
  if (!value) return false;
  return value !== '0' && value.toLowerCase() !== 'false';
}
