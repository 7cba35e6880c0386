import { describe, it, expect, afterEach } from '@jest/globals';
import { createApp, type App, type Platform } from '@/app/index';
import { loadConfig } from '@/config/app-config';
import { isPortInUse } from '@/lib/port-utils';
import { createFakeClock } from '../../__support__/fakes/clock';
import { createFakeConnector } from '../../__support__/fakes/connector';
import { createFakeRuntime, unit } from '../../__support__/fakes/runtime';
import { getFreePort, silentLogger } from '../../__support__/utilities/net-helpers';

const config = loadConfig({ NODE_ENV: 'test', DOCKER_SOCKET: '/var/run/docker.sock' });

describe('createApp', () => {
  let app: App | undefined;

  afterEach(async () => {
    await app?.shutdown();
    app = undefined;
  });

  function setup(ping: () => Promise<boolean> = async () => true): {
    app: App;
    cleanups: number[];
  } {
    const cleanups: number[] = [];
    const platform: Platform = {
      runtime: createFakeRuntime({ units: [unit('kafka-0')] }),
      connector: createFakeConnector(),
      client: { ping },
      cleanup: async () => {
        cleanups.push(app?.tunnels.list().length ?? -1);
        return 2;
      },
    };
    app = createApp({ config, logger: silentLogger(), platform, clock: createFakeClock() });
    return { app, cleanups };
  }

  it('closes tunnels before cleaning up the platform', async () => {
    const { app: instance, cleanups } = setup();
    const localPort = await getFreePort();
    await instance.tunnels.open({ target: 'kafka-0', localPort, remotePort: 9092 });

    await instance.shutdown();

    expect(cleanups).toEqual([0]);
    expect(await isPortInUse(localPort)).toBe(false);
  });

  it('shuts down only once', async () => {
    const { app: instance, cleanups } = setup();

    const first = instance.shutdown();
    const second = instance.shutdown();

    expect(second).toBe(first);
    await first;
    await instance.shutdown();
    expect(cleanups).toHaveLength(1);
  });

  it('checks the platform matching the runtime kind', async () => {
    const { app: instance } = setup();

    await expect(instance.healthCheck()).resolves.toEqual({
      status: 'healthy',
      dependencies: { kubernetes: { available: true, detail: 'connected' } },
    });
  });

  it('reports an unreachable platform as degraded', async () => {
    const { app: instance } = setup(async () => false);

    const report = await instance.healthCheck();

    expect(report.status).toBe('degraded');
    expect(report.dependencies.kubernetes?.error).toBe('Unable to reach Kubernetes cluster');
  });

  it('exposes the runtime it was built with', () => {
    const { app: instance } = setup();

    expect(instance.runtime.kind).toBe('kubernetes');
    expect(instance.config).toBe(config);
  });
});
