import { describe, it, expect } from 'vitest';
import { parseCliOptions } from './options.js';

describe('parseCliOptions', () => {
  it('should default to config.yaml in the working directory', () => {
    expect(parseCliOptions([], '/srv/nfe')).toEqual({ configPath: '/srv/nfe/config.yaml', help: false });
  });

  it('should accept --config with a separate or inline value', () => {
    expect(parseCliOptions(['--config', 'conf/intake.yaml'], '/srv/nfe').configPath).toBe('/srv/nfe/conf/intake.yaml');
    expect(parseCliOptions(['--config=/etc/nfe.yaml'], '/srv/nfe').configPath).toBe('/etc/nfe.yaml');
    expect(parseCliOptions(['-c', 'other.yaml'], '/srv/nfe').configPath).toBe('/srv/nfe/other.yaml');
  });

  it('should recognize help', () => {
    expect(parseCliOptions(['--help'], '/srv/nfe').help).toBe(true);
  });

  it('should reject a missing value and unknown options', () => {
    expect(() => parseCliOptions(['--config'], '/srv/nfe')).toThrow('Option --config requires a file path');
    expect(() => parseCliOptions(['--verbose'], '/srv/nfe')).toThrow('Unknown option: --verbose');
  });
});
