import axios, { AxiosInstance } from 'axios';
import { AdminService } from '../../src/admin/admin-service';
import { GuildCommands, ManualDispatcher } from '../../src/guilds/commands';
import { GuildScheduleRegistry } from '../../src/guilds/registry';
import { GuildSchedule } from '../../src/system/types';
import { MemoryConfigStore, makeSchedule, silentLogger } from '../helpers/fakes';

class RecordingManualDispatcher implements ManualDispatcher {
  public submitted: string[] = [];

  submit(guildId: string, _schedule: GuildSchedule, _trigger: 'manual'): void {
    this.submitted.push(guildId);
  }
}

describe('AdminService', () => {
  let store: MemoryConfigStore;
  let dispatcher: RecordingManualDispatcher;
  let service: AdminService;
  let client: AxiosInstance;

  beforeEach(async () => {
    store = new MemoryConfigStore([makeSchedule('100', { channelId: '555', apiKey: 'test-secret-key-1234' })]);
    const registry = new GuildScheduleRegistry(store, silentLogger());
    await registry.load();
    dispatcher = new RecordingManualDispatcher();

    service = new AdminService(
      new GuildCommands(registry, dispatcher),
      {
        scheduler: () => ({
          isRunning: true,
          tickSeconds: 30,
          timezone: 'UTC',
          lastTick: null,
          tickCount: 0,
          dispatchCount: 0,
          skippedTicks: 0
        }),
        cacheSize: () => 1,
        activeDispatches: () => 0,
        history: () => new Map()
      },
      { port: 0, token: 'test-admin-token' },
      silentLogger()
    );
    await service.start();

    client = axios.create({
      baseURL: `http://127.0.0.1:${service.boundPort ?? 0}`,
      headers: { Authorization: 'Bearer test-admin-token' },
      validateStatus: () => true
    });
  });

  afterEach(async () => {
    await service.stop();
  });

  it('should report health', async () => {
    const response = await client.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ status: 'healthy' });
  });

  it('should report status', async () => {
    const response = await client.get('/status');

    expect(response.data).toMatchObject({ cacheSize: 1, activeDispatches: 0, history: {} });
  });

  it('should list guilds with masked keys', async () => {
    const response = await client.get('/guilds');

    expect(response.data).toEqual([
      {
        guildId: '100',
        channel: '555',
        postTime: '08:00',
        apiKey: 'test************1234',
        mention: 'none',
        lastPostDate: null
      }
    ]);
  });

  it('should update the post time', async () => {
    const response = await client.put('/guilds/100/time', { hour: 7, minute: 30 });

    expect(response.status).toBe(200);
    expect(response.data.postTime).toBe('07:30');
    expect(store.saved('100')).toMatchObject({ postHour: 7, postMinute: 30 });
  });

  it('should reject invalid input with 400', async () => {
    const response = await client.put('/guilds/100/time', { hour: 25 });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      error: 'configuration_error',
      message: 'hour must be an integer between 0 and 23'
    });
  });

  it('should queue a manual test', async () => {
    const response = await client.post('/guilds/100/test');

    expect(response.status).toBe(202);
    expect(response.data.queued).toBe(true);
    expect(dispatcher.submitted).toEqual(['100']);
  });

  it('should refuse a manual test for an unconfigured guild', async () => {
    const response = await client.post('/guilds/200/test');

    expect(response.status).toBe(400);
    expect(response.data.error).toBe('destination_unresolvable');
    expect(dispatcher.submitted).toEqual([]);
  });

  it('should reject guild requests without the admin token', async () => {
    const response = await client.put('/guilds/100/api-key', { apiKey: 'test-other-key' }, { headers: { Authorization: '' } });

    expect(response.status).toBe(401);
    expect(response.data).toEqual({ error: 'unauthorized', message: 'A valid admin token is required' });
    expect(store.saveCount).toBe(0);
  });

  it('should reject guild requests with the wrong admin token', async () => {
    const response = await client.post('/guilds/100/test', undefined, {
      headers: { Authorization: 'Bearer test-wrong-token' }
    });

    expect(response.status).toBe(401);
    expect(dispatcher.submitted).toEqual([]);
  });

  it('should serve health and status without a token', async () => {
    const health = await client.get('/health', { headers: { Authorization: '' } });
    const status = await client.get('/status', { headers: { Authorization: '' } });

    expect(health.status).toBe(200);
    expect(status.status).toBe(200);
  });

  it('should answer unknown routes with 404', async () => {
    const response = await client.get('/nowhere');

    expect(response.status).toBe(404);
  });
});
