// Empty strings count as unset
export function getEnv(name: string): string | null {
  const v = process.env[name];
  return v && v.length > 0 ? v : null;
}

export function envFlag(name: string): boolean {
  const v = getEnv(name);
  return v === '1' || v?.toLowerCase() === 'true';
}
