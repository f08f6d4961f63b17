import path from 'path';
import { ConfigurationError } from '../../src/core/errors';
import {
  buildConfig,
  parseCommand,
  parseLogLevel,
  parseTitleSource,
  resolveBaseUrl,
  type CliFlags
} from '../../src/util/config';

const flags: CliFlags = {
  spaceKey: 'DOCS',
  folder: '/work/space',
  command: 'plan'
};

const env = {
  CONFLUENCE_USERNAME: 'env-user',
  CONFLUENCE_PASSWORD: 'test-secret',
  CONFLUENCE_ORGNAME: 'example'
};

describe('config validation', () => {
  describe('resolveBaseUrl', () => {
    it('builds a cloud URL from a plain org name', () => {
      expect(resolveBaseUrl('acme')).toBe('https://acme.atlassian.net/wiki');
    });

    it('uses a dotted org name as host', () => {
      expect(resolveBaseUrl('wiki.example.com')).toBe('https://wiki.example.com');
    });
  });

  describe('parseLogLevel', () => {
    it('defaults to info', () => {
      expect(parseLogLevel(undefined)).toBe('info');
    });

    it('accepts aliases in any case', () => {
      expect(parseLogLevel('WARNING')).toBe('warn');
      expect(parseLogLevel('critical')).toBe('error');
      expect(parseLogLevel('Debug')).toBe('debug');
    });

    it('rejects unknown levels', () => {
      expect(() => parseLogLevel('verbose')).toThrow(new ConfigurationError('Invalid log level: verbose'));
    });
  });

  describe('parseCommand', () => {
    it('is case insensitive', () => {
      expect(parseCommand('PLAN')).toBe('plan');
      expect(parseCommand('execute')).toBe('execute');
    });

    it('rejects other commands', () => {
      expect(() => parseCommand('deploy')).toThrow('Invalid command deploy. The command must be: plan or execute');
    });
  });

  describe('parseTitleSource', () => {
    it('defaults to filename', () => {
      expect(parseTitleSource(undefined)).toBe('filename');
      expect(parseTitleSource('link')).toBe('link');
    });

    it('rejects unknown sources', () => {
      expect(() => parseTitleSource('heading')).toThrow(ConfigurationError);
    });
  });

  describe('buildConfig', () => {
    it('builds the run configuration', () => {
      expect(buildConfig(env, flags)).toEqual({
        spaceKey: 'DOCS',
        workspaceDir: '/work/space',
        planDir: path.join('/work/space', 'plan'),
        command: 'plan',
        username: 'env-user',
        password: 'test-secret',
        orgName: 'example',
        baseUrl: 'https://example.atlassian.net/wiki',
        logLevel: 'info',
        naming: { titleSource: 'filename', stripExportId: false }
      });
    });

    it('prefers flags over environment over file', () => {
      const config = buildConfig(
        { CONFLUENCE_PASSWORD: 'env-secret', CONFLUENCE_ORGNAME: 'env-org' },
        { ...flags, username: 'flag-user' },
        { username: 'file-user', password: 'file-secret', orgname: 'file-org', loglevel: 'debug' }
      );
      expect(config.username).toBe('flag-user');
      expect(config.password).toBe('env-secret');
      expect(config.orgName).toBe('env-org');
      expect(config.logLevel).toBe('debug');
    });

    it('takes naming from flags, then the file', () => {
      expect(buildConfig(env, flags, { titles: 'link', stripExportId: true }).naming)
        .toEqual({ titleSource: 'link', stripExportId: true });
      expect(buildConfig(env, { ...flags, titles: 'filename', stripExportId: false }, { titles: 'link', stripExportId: true }).naming)
        .toEqual({ titleSource: 'filename', stripExportId: false });
    });

    it('requires credentials and org name', () => {
      expect(() => buildConfig({}, flags)).toThrow('Username not specified by environment variable or option');
      expect(() => buildConfig({ CONFLUENCE_USERNAME: 'u' }, flags))
        .toThrow('Password not specified by environment variable or option');
      expect(() => buildConfig({ CONFLUENCE_USERNAME: 'u', CONFLUENCE_PASSWORD: 'test-secret' }, flags))
        .toThrow('Org name not specified by environment variable or option');
    });

    it('validates the command before anything else', () => {
      expect(() => buildConfig({}, { ...flags, command: 'sync' })).toThrow('Invalid command sync');
    });

    it('rejects a blank space key', () => {
      expect(() => buildConfig(env, { ...flags, spaceKey: '  ' })).toThrow('Space key not specified');
    });
  });
});
