import type { ScanSessionOptions } from '../scanner/scanSession';
import { getProcessEnv, type EnvRecord } from '../utils/env';
import { createConsoleLogger } from './logger';

export const DEFAULT_BOX_SIZE = 200;

export type ScannerConfig = {
  boxSize: number;
  symbologies?: string[];
  verbose: boolean;
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function parseScannerConfigFromEnv(env: Record<string, unknown>): ScannerConfig {
  const sizeRaw = env.SCANNER_BOX_SIZE;
  const symRaw = env.SCANNER_SYMBOLOGIES;
  const verboseRaw = env.SCANNER_VERBOSE;

  const parsedSize = typeof sizeRaw === 'string' ? Number(sizeRaw.trim()) : NaN;
  const boxSize = Number.isInteger(parsedSize) && parsedSize > 0 ? parsedSize : DEFAULT_BOX_SIZE;

  const symbologies = typeof symRaw === 'string' && symRaw.trim().length > 0
    ? symRaw.split('|').map((s: string) => s.trim()).filter((s: string) => s.length > 0)
    : undefined;

  const verbose = typeof verboseRaw === 'string' && TRUTHY.has(verboseRaw.trim().toLowerCase());

  return {
    boxSize,
    symbologies: symbologies && symbologies.length > 0 ? symbologies : undefined,
    verbose,
  };
}

export function getEnvScannerConfig(env: EnvRecord = getProcessEnv()): ScannerConfig {
  return parseScannerConfigFromEnv(env);
}

export type ConfiguredSessionOptions = Pick<ScanSessionOptions, 'boxSize' | 'symbologies' | 'logger'>;

// Devices and hooks stay with the caller; spread the result into the session options.
export function sessionOptionsFromConfig(config: ScannerConfig): ConfiguredSessionOptions {
  return {
    boxSize: config.boxSize,
    symbologies: config.symbologies,
    logger: createConsoleLogger({ verbose: config.verbose }),
  };
}
