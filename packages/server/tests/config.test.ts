import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadServerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadServerConfig({})).toEqual({ port: 5000, reportInterval: 100, batchSteps: 1000, chunkSize: 10 });
  });

  it('reads values from the environment', () => {
    const config = loadServerConfig({
      STEPWISE_PORT: '8080',
      STEPWISE_REPORT_INTERVAL: '25',
      STEPWISE_BATCH_STEPS: '500',
      STEPWISE_CHUNK_SIZE: '4',
    });
    expect(config).toEqual({ port: 8080, reportInterval: 25, batchSteps: 500, chunkSize: 4 });
  });

  it('names every invalid variable', () => {
    let caught: unknown;
    try {
      loadServerConfig({ STEPWISE_PORT: 'http', STEPWISE_CHUNK_SIZE: '0' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues.map(issue => issue.split(':')[0])).toEqual(['STEPWISE_PORT', 'STEPWISE_CHUNK_SIZE']);
  });
});
