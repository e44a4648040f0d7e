import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, readConfigFile, resolveConfig } from '../../utils/config-loader';
import { configHelpers } from '../../config/commute-rank.global.config';
import { ConfigError } from '../../utils/errors';

describe('Configuration', () => {
  describe('resolveConfig', () => {
    it('should fall back to the built-in defaults', () => {
      expect(resolveConfig({}, {}, {})).toEqual({
        googleMaps: {
          apiKey: '',
          baseUrl: 'https://maps.googleapis.com/maps/api',
          timeoutMs: 10000,
          departureTime: 'now',
        },
        retry: { maxAttempts: 3, baseDelayMs: 1000 },
        mode: 'driving',
        verbose: false,
      });
    });

    it('should read defaults from environment variables', () => {
      const config = resolveConfig({}, {}, {
        GOOGLE_MAPS_API_KEY: 'test-key',
        COMMUTE_RANK_MAX_ATTEMPTS: '5',
        COMMUTE_RANK_BACKOFF_BASE_MS: '250',
        COMMUTE_RANK_VERBOSE: 'true',
      });

      expect(config.googleMaps.apiKey).toBe('test-key');
      expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 250 });
      expect(config.verbose).toBe(true);
    });

    it('should let the file override the environment and the overrides win over both', () => {
      const fileConfig = {
        mode: 'walking',
        retry: { maxAttempts: 4, baseDelayMs: 500 },
        googleMaps: { timeoutMs: 2000 },
      };

      const config = resolveConfig(fileConfig, { maxAttempts: '2' }, { COMMUTE_RANK_MAX_ATTEMPTS: '7' });

      expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 500 });
      expect(config.googleMaps.timeoutMs).toBe(2000);
      expect(config.mode).toBe('walking');
    });

    it('should strip trailing slashes from the base URL', () => {
      const config = resolveConfig({ googleMaps: { baseUrl: 'https://maps.example.test/api/' } }, {}, {});
      expect(config.googleMaps.baseUrl).toBe('https://maps.example.test/api');
    });

    it('should parse an epoch departure time', () => {
      expect(resolveConfig({}, { departureTime: '1418809537' }, {}).googleMaps.departureTime).toBe(1418809537);
    });

    it('should reject invalid values', () => {
      expect(() => resolveConfig({}, { maxAttempts: '0' }, {})).toThrow(ConfigError);
      expect(() => resolveConfig({}, { timeoutMs: 'soon' }, {})).toThrow('timeoutMs must be a positive integer, got "soon"');
      expect(() => resolveConfig({ retry: 'fast' }, {}, {})).toThrow('Config section "retry" must be a mapping');
    });
  });

  describe('configHelpers.parseMode', () => {
    it('should accept the supported modes case-insensitively', () => {
      expect(configHelpers.parseMode('Transit')).toBe('transit');
      expect(configHelpers.parseMode('walking')).toBe('walking');
    });

    it('should map bicycling onto bicycle', () => {
      expect(configHelpers.parseMode('bicycling')).toBe('bicycle');
    });

    it('should reject unknown modes', () => {
      expect(() => configHelpers.parseMode('flying')).toThrow(
        'Unsupported mode "flying". Expected one of: driving, transit, bicycle, walking'
      );
    });
  });

  describe('config files', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commute-rank-config-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load a YAML file given explicitly', () => {
      const configPath = path.join(tempDir, 'custom.yaml');
      fs.writeFileSync(configPath, ['mode: transit', 'retry:', '  maxAttempts: 5', 'googleMaps:', '  departureTime: 1418809537', ''].join('\n'));

      const config = loadConfig(configPath, {}, {});

      expect(config.mode).toBe('transit');
      expect(config.retry.maxAttempts).toBe(5);
      expect(config.googleMaps.departureTime).toBe(1418809537);
    });

    it('should treat an empty file as no settings', () => {
      const configPath = path.join(tempDir, 'empty.yaml');
      fs.writeFileSync(configPath, '');
      expect(readConfigFile(configPath)).toEqual({});
    });

    it('should fail when an explicit file is missing', () => {
      expect(() => loadConfig(path.join(tempDir, 'nope.yaml'), {}, {})).toThrow(ConfigError);
    });

    it('should reject a document that is not a mapping', () => {
      const configPath = path.join(tempDir, 'list.yaml');
      fs.writeFileSync(configPath, '- driving\n- transit\n');
      expect(() => readConfigFile(configPath)).toThrow(`Configuration in ${configPath} must be a mapping`);
    });
  });
});
