import { describe, it, expect } from '@jest/globals';
import { overridesToConfig } from './index';
import { applyConfigUpdates, DEFAULT_CONFIG, type MutableAppConfig } from './types/config';

describe('overridesToConfig', () => {
  it('returns nothing without overrides', () => {
    expect(overridesToConfig(DEFAULT_CONFIG, { simulated: false })).toEqual({});
  });

  it('points the base URL at the backend being selected', () => {
    expect(overridesToConfig(DEFAULT_CONFIG, { simulated: false, backend: 'nanodlp', baseUrl: 'http://10.0.0.5' })).toEqual(
      { backend: 'nanodlp', nanodlpBaseUrl: 'http://10.0.0.5' }
    );
    expect(overridesToConfig(DEFAULT_CONFIG, { simulated: false, baseUrl: 'http://10.0.0.6:12357' })).toEqual({
      odysseyUrl: 'http://10.0.0.6:12357',
    });
  });

  it('uses the stored backend when none is given', () => {
    const stored = { ...DEFAULT_CONFIG, backend: 'nanodlp' as const };

    expect(overridesToConfig(stored, { simulated: false, baseUrl: 'http://10.0.0.5' })).toEqual({
      nanodlpBaseUrl: 'http://10.0.0.5',
    });
  });

  it('enables the simulator and WebUI settings', () => {
    expect(overridesToConfig(DEFAULT_CONFIG, { simulated: true, webUIPort: 8080, webUIEnabled: false })).toEqual({
      developer: { simulated: true },
      webUIPort: 8080,
      webUIEnabled: false,
    });
  });

  it('produces updates the configuration accepts', () => {
    const target: MutableAppConfig = { ...DEFAULT_CONFIG, developer: { ...DEFAULT_CONFIG.developer } };
    const updates = overridesToConfig(DEFAULT_CONFIG, {
      simulated: true,
      backend: 'nanodlp',
      baseUrl: 'http://10.0.0.5',
      webUIPort: 3200,
    });

    expect(applyConfigUpdates(target, updates)).toEqual(['backend', 'developer', 'nanodlpBaseUrl', 'webUIPort']);
    expect(target.nanodlpBaseUrl).toBe('http://10.0.0.5');
  });
});
