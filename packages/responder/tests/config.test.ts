import { loadConfig, DEFAULT_SERVER_ID, DEFAULT_HOST, DEFAULT_PORT } from '../src/config';

describe('loadConfig', () => {
  test('falls back to "unknown" when HOSTNAME is not set', () => {
    expect(loadConfig({}).serverId).toBe(DEFAULT_SERVER_ID);
    expect(DEFAULT_SERVER_ID).toBe('unknown');
  });

  test('falls back to "unknown" when HOSTNAME is empty', () => {
    expect(loadConfig({ HOSTNAME: '' }).serverId).toBe('unknown');
  });

  test('uses HOSTNAME verbatim', () => {
    expect(loadConfig({ HOSTNAME: 'node-7' }).serverId).toBe('node-7');
    expect(loadConfig({ HOSTNAME: ' spaced ' }).serverId).toBe(' spaced ');
  });

  test('listens on all interfaces on port 5000', () => {
    const config = loadConfig({});
    expect(config.host).toBe(DEFAULT_HOST);
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.port).toBe(5000);
  });

  test('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({ HOSTNAME: 'node-7' }))).toBe(true);
  });

  test('snapshots the environment at load time', () => {
    const env: NodeJS.ProcessEnv = { HOSTNAME: 'node-1' };
    const config = loadConfig(env);
    env.HOSTNAME = 'node-2';
    expect(config.serverId).toBe('node-1');
  });

  describe('with the process environment', () => {
    const original = process.env.HOSTNAME;

    afterEach(() => {
      if (original === undefined) {
        delete process.env.HOSTNAME;
      } else {
        process.env.HOSTNAME = original;
      }
    });

    test('reads process.env by default', () => {
      process.env.HOSTNAME = 'replica-a';
      expect(loadConfig().serverId).toBe('replica-a');
    });

    test('falls back when process.env has no HOSTNAME', () => {
      delete process.env.HOSTNAME;
      expect(loadConfig().serverId).toBe('unknown');
    });
  });
});
