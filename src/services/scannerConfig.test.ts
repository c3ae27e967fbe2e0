import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_BOX_SIZE, getEnvScannerConfig, parseScannerConfigFromEnv, sessionOptionsFromConfig } from './scannerConfig';

describe('scanner config', () => {
  it('parses env variables into scanner config (trim + split)', () => {
    const config = parseScannerConfigFromEnv({
      SCANNER_BOX_SIZE: ' 240 ',
      SCANNER_SYMBOLOGIES: ' QR | EAN-13 |  ',
      SCANNER_VERBOSE: 'TRUE',
    });
    expect(config).toEqual({ boxSize: 240, symbologies: ['QR', 'EAN-13'], verbose: true });
  });

  it('falls back to defaults for missing or invalid values', () => {
    expect(parseScannerConfigFromEnv({})).toEqual({ boxSize: DEFAULT_BOX_SIZE, symbologies: undefined, verbose: false });
    expect(parseScannerConfigFromEnv({ SCANNER_BOX_SIZE: '12.5' }).boxSize).toBe(200);
    expect(parseScannerConfigFromEnv({ SCANNER_BOX_SIZE: '-3' }).boxSize).toBe(200);
    expect(parseScannerConfigFromEnv({ SCANNER_BOX_SIZE: 180 }).boxSize).toBe(200);
    expect(parseScannerConfigFromEnv({ SCANNER_SYMBOLOGIES: ' | ' }).symbologies).toBeUndefined();
    expect(parseScannerConfigFromEnv({ SCANNER_VERBOSE: 'no' }).verbose).toBe(false);
  });

  it('reads from the given env record', () => {
    expect(getEnvScannerConfig({ SCANNER_BOX_SIZE: '150', SCANNER_VERBOSE: '1' })).toEqual({
      boxSize: 150,
      symbologies: undefined,
      verbose: true,
    });
  });
});

describe('sessionOptionsFromConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('carries box size and symbologies and wires verbose into the logger', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const opts = sessionOptionsFromConfig(parseScannerConfigFromEnv({
      SCANNER_BOX_SIZE: '260',
      SCANNER_SYMBOLOGIES: 'QR',
      SCANNER_VERBOSE: 'yes',
    }));
    expect(opts.boxSize).toBe(260);
    expect(opts.symbologies).toEqual(['QR']);
    opts.logger?.debug('armed');
    expect(debug).toHaveBeenCalledWith('[scan] armed');
  });

  it('keeps debug output off when not verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    sessionOptionsFromConfig(parseScannerConfigFromEnv({})).logger?.debug('armed');
    expect(debug).not.toHaveBeenCalled();
  });
});
