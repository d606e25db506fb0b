import { getEnv } from '@utils/env';
import { DEFAULT_HZ } from '@core/system/system';

export interface Chip8Config {
  romPath: string;
  debug: boolean;
  inspect: boolean;
  hz: number;
  scale: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const USAGE = 'Usage: chip8 <rom> [--debug|-d] [--inspect|-i] [--hz=600] [--scale=10]';

const DEFAULT_SCALE = 10;
const MAX_HZ = 5000;

const intOr = (raw: string | null | undefined, fallback: number, min: number, max: number): number => {
  if (raw == null) return fallback;
  const v = Number(raw);
  if (!Number.isFinite(v) || !Number.isInteger(v)) return fallback;
  return Math.max(min, Math.min(max, v));
};

// argv excludes the node binary and script path
export function parseConfig(argv: readonly string[], env: (name: string) => string | null = getEnv): Chip8Config {
  const flag = (name: string): boolean => {
    const v = env(name);
    return v === '1' || v?.toLowerCase() === 'true';
  };
  let romPath = env('CHIP8_ROM');
  let debug = flag('CHIP8_DEBUG');
  let inspect = false;
  let hzRaw = env('CHIP8_HZ');
  let scaleRaw: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--debug' || a === '-d') debug = true;
    else if (a === '--inspect' || a === '-i') inspect = true;
    else if (a.startsWith('--hz=')) hzRaw = a.slice(5);
    else if (a === '--hz') hzRaw = argv[++i] ?? null;
    else if (a.startsWith('--scale=')) scaleRaw = a.slice(8);
    else if (a === '--scale') scaleRaw = argv[++i] ?? null;
    else if (a.startsWith('-')) throw new ConfigError(`Unknown option ${a}`);
    else romPath = a;
  }
  if (!romPath) throw new ConfigError('Missing ROM path');

  return {
    romPath,
    debug,
    inspect,
    hz: intOr(hzRaw, DEFAULT_HZ, 1, MAX_HZ),
    scale: intOr(scaleRaw, DEFAULT_SCALE, 1, 64),
  };
}
