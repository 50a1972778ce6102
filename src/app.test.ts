/**
 * Wiring tests for NetworkStatusApp
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { NetworkStatusApp } from './app';
import { ScriptedProber, scriptForStates } from './test-support/fixtures';

describe('NetworkStatusApp', () => {
  let tempDir: string;
  let configPath: string;
  const originalPort = process.env.PORT;

  beforeEach(async () => {
    delete process.env.PORT;
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'netstatus-app-'));
    configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({
      check_interval_seconds: 3600,
      log_file: '',
      dashboard: { host: '127.0.0.1', port: 0, recent_limit: 10 }
    }));
  });

  afterEach(async () => {
    if (originalPort !== undefined) {
      process.env.PORT = originalPort;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should refuse to start before initialization', async () => {
    const app = new NetworkStatusApp({ configPath });
    await expect(app.start()).rejects.toThrow('App must be initialized before starting');
  });

  it('should monitor, report health and shut down', async () => {
    const prober = new ScriptedProber(scriptForStates(['UP']));
    const app = new NetworkStatusApp({ configPath, prober });

    await app.initialize();
    expect(app.healthCheck().status).toBe('unhealthy');

    await app.start();
    await app.getMonitor()?.runTick();

    expect(app.getDashboard()?.getCurrentStatus().current_state).toBe('UP');
    expect(app.healthCheck().status).toBe('healthy');
    expect(app.getAPIServer()?.getPort()).toBeGreaterThan(0);

    await app.stop();

    expect(app.healthCheck().status).toBe('unhealthy');
    expect(app.healthCheck().scheduler?.running).toBe(false);
  });
});
