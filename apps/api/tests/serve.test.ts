import { describe, it, expect, afterEach } from 'vitest';
import { startServer, toOverrides, type RunningServer } from '../src/commands/serve.js';
import type { AppConfig } from '../src/config.js';

const config: AppConfig = { port: 0, host: '127.0.0.1', dbPath: ':memory:', logLevel: 'info' };

let running: RunningServer | undefined;

afterEach(async () => {
  await running?.close();
  running = undefined;
});

describe('toOverrides', () => {
  it('maps command options to variable names', () => {
    expect(toOverrides({ port: '3000', host: 'localhost', db: '/tmp/todo.db', logLevel: 'debug' })).toEqual({
      PORT: '3000',
      HOST: 'localhost',
      DATABASE_PATH: '/tmp/todo.db',
      LOG_LEVEL: 'debug',
    });
  });
});

describe('startServer', () => {
  it('serves the API on the bound address', async () => {
    running = await startServer(config);
    expect(running.address.port).toBeGreaterThan(0);

    const res = await fetch(`http://127.0.0.1:${running.address.port}/api/v1/tasks`);
    expect(res.status).toBe(200);
  });

  it('rejects when the port is taken', async () => {
    running = await startServer(config);
    await expect(startServer({ ...config, port: running.address.port })).rejects.toThrow(/EADDRINUSE/);
  });

  it('stops listening after close', async () => {
    const server = await startServer(config);
    await server.close();
    expect(server.server.listening).toBe(false);
  });
});
