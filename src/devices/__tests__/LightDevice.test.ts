import { DeviceUnavailableError, IntentValidationError } from '../../core/errors/LightError';
import {
  ConnectionStatus,
  ControlMode,
  DeviceEventType,
  DeviceSnapshot,
  DeviceState,
  LedMode,
  ModelProfile
} from '../../core/types/LightTypes';
import { ConnectionSlotPool } from '../../scheduler/ConnectionSlotPool';
import { UpdateScheduler } from '../../scheduler/UpdateScheduler';
import { ReceivedFrame, SimulatedTransport } from '../../testing/SimulatedTransport';
import { DeviceTimings, FrameSentEvent, LightDevice } from '../LightDevice';

const H6046: ModelProfile = {
  model: 'H6046',
  ledMode: LedMode.MODE_1501,
  brightnessMax: 100,
  minKelvin: 1500,
  maxKelvin: 6500,
  temperatureEncoding: 'native'
};

const FAST_TIMINGS: Partial<DeviceTimings> = {
  maxReconnectAttempts: 3,
  reconnectBaseDelay: 5,
  maxReconnectDelay: 20,
  retryDelay: 5,
  sendInterval: 1,
  idleInterval: 5,
  pingInterval: 2,
  keepAliveTicks: 0,
  maxSendsPerRun: 8
};

const ADDRESS = 'AA:BB:CC:DD:EE:01';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

async function waitFor(predicate: () => boolean, timeout = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeout) {
      throw new Error('Condition not met in time');
    }
    await delay(2);
  }
}

describe('LightDevice', () => {
  let transport: SimulatedTransport;
  let pool: ConnectionSlotPool;
  let scheduler: UpdateScheduler;
  let devices: LightDevice[];
  let received: string[];

  function setup(parallelism = 3, capacity = 5, maxQueued = 0): void {
    transport = new SimulatedTransport();
    pool = new ConnectionSlotPool({ capacity, maxQueued });
    scheduler = new UpdateScheduler({ parallelism, cancelAttempts: 20 }, pool);
    devices = [];
    received = [];
    transport.on('frame', (address: string, frame: ReceivedFrame) => {
      received.push(`${address.slice(-2)}:${frame.command}`);
    });
  }

  function createDevice(
    address = ADDRESS,
    timings: Partial<DeviceTimings> = {},
    random: () => number = () => 0
  ): LightDevice {
    const device = new LightDevice({
      address,
      model: 'H6046',
      profile: H6046,
      transport,
      pool,
      scheduler,
      timings: { ...FAST_TIMINGS, ...timings },
      notify: { minDelay: 0, perUpdatePenalty: 0 },
      random
    });
    scheduler.register(device);
    devices.push(device);
    return device;
  }

  function commands(address = ADDRESS): number[] {
    return transport.getFrames(address).map(frame => frame.command);
  }

  beforeEach(() => {
    setup();
  });

  afterEach(async () => {
    await scheduler.shutdown();
    devices.forEach(device => device.dispose());
  });

  test('should derive a name from the model and address', () => {
    const device = createDevice('aa:bb:cc:dd:ee:0f');

    expect(device.address).toBe('AA:BB:CC:DD:EE:0F');
    expect(device.name).toBe('H6046 EE0F');
  });

  test('should send power before brightness before color', async () => {
    const device = createDevice();

    device.setIntent({
      color: { mode: ControlMode.COLOR, rgb: [255, 0, 0] },
      brightness: 200,
      power: true
    });
    await scheduler.whenIdle();

    const frames = transport.getFrames(ADDRESS);
    expect(frames.map(frame => frame.command)).toEqual([0x01, 0x04, 0x05]);
    expect(frames[0].payload[0]).toBe(0x01);
    expect(frames[1].payload[0]).toBe(78);
    expect(frames[2].payload.slice(0, 12)).toEqual([0x15, 0x01, 0xff, 0, 0, 0, 0, 0, 0, 0, 0xff, 0x74]);

    expect(device.snapshot()).toMatchObject({
      state: DeviceState.IDLE,
      connectionStatus: ConnectionStatus.DISCONNECTED,
      available: true,
      power: true,
      brightness: 200,
      rgb: [255, 0, 0],
      controlMode: ControlMode.COLOR,
      dirty: { power: false, brightness: false, color: false }
    });
    expect(transport.isConnected(ADDRESS)).toBe(false);
  });

  test('should not send an intent that matches the desired state', async () => {
    const device = createDevice();
    device.setIntent({ power: true, brightness: 100 });
    await scheduler.whenIdle();

    device.setIntent({ power: true, brightness: 100 });

    expect(device.isDirty()).toBe(false);
    expect(scheduler.isRunning(ADDRESS)).toBe(false);
    expect(commands()).toEqual([0x01, 0x04]);
    expect(scheduler.getStats().completedRuns).toBe(1);
  });

  test('should only send the categories that changed', async () => {
    const device = createDevice();
    device.setIntent({ power: true, brightness: 100 });
    await scheduler.whenIdle();

    device.setIntent({ power: true, brightness: 255 });
    await scheduler.whenIdle();

    const frames = transport.getFrames(ADDRESS);
    expect(frames.map(frame => frame.command)).toEqual([0x01, 0x04, 0x04]);
    expect(frames[2].payload[0]).toBe(100);
  });

  test('should send a native color temperature for models that take one', async () => {
    const device = createDevice();

    device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: 3000 } });
    await scheduler.whenIdle();

    const [frame] = transport.getFrames(ADDRESS);
    expect(frame.payload.slice(0, 12)).toEqual([0x15, 0x01, 0xff, 0xff, 0xff, 0x0b, 0xb8, 0, 0, 0, 0xff, 0x74]);
    expect(device.snapshot()).toMatchObject({
      kelvin: 3000,
      rgb: [255, 177, 110],
      controlMode: ControlMode.TEMPERATURE
    });
  });

  test('should reject invalid intents without applying any field', () => {
    const device = createDevice();

    expect(() => device.setIntent({ power: true, brightness: 256 })).toThrow(IntentValidationError);
    expect(() => device.setIntent({ brightness: 1.5 })).toThrow(IntentValidationError);
    expect(() => device.setIntent({ color: { mode: ControlMode.COLOR, rgb: [0, 0, 300] } }))
      .toThrow('RGB color must be three integers between 0 and 255');
    expect(() => device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: -1 } }))
      .toThrow('Color temperature must be a non-negative integer');
    expect(() => device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: 2700.5 } }))
      .toThrow(IntentValidationError);

    expect(device.getDesired()).toEqual({});
    expect(device.isDirty()).toBe(false);
    expect(scheduler.isRunning(ADDRESS)).toBe(false);
  });

  test('should clamp color temperatures outside the supported range', async () => {
    const device = createDevice();

    device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: 500 } });
    expect(device.getDesired().color).toEqual({ mode: ControlMode.TEMPERATURE, kelvin: 1000 });
    await scheduler.whenIdle();

    device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: 1000 } });
    expect(device.isDirty()).toBe(false);

    device.setIntent({ color: { mode: ControlMode.TEMPERATURE, kelvin: 50000 } });
    expect(device.getDesired().color).toEqual({ mode: ControlMode.TEMPERATURE, kelvin: 40000 });
    await scheduler.whenIdle();

    const frames = transport.getFrames(ADDRESS);
    expect(frames).toHaveLength(2);
    expect(frames[0].payload.slice(0, 12)).toEqual([0x15, 0x01, 255, 68, 0, 0, 0, 0, 0, 0, 0xff, 0x74]);
    expect(frames[1].payload.slice(0, 12)).toEqual([0x15, 0x01, 152, 186, 255, 0, 0, 0, 0, 0, 0xff, 0x74]);
    expect(device.snapshot()).toMatchObject({ kelvin: 40000, rgb: [152, 186, 255] });
  });

  test('should retry a failed connect and reset the attempt counter', async () => {
    const device = createDevice();
    transport.failNextConnects(ADDRESS, 2);

    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(transport.getConnectAttempts(ADDRESS)).toBe(3);
    expect(commands()).toEqual([0x01]);
    expect(device.snapshot().reconnectAttempts).toBe(0);
    expect(device.isAvailable()).toBe(true);
  });

  test('should mark the device unavailable after the attempt ceiling', async () => {
    const device = createDevice();
    const unavailable = jest.fn();
    device.on(DeviceEventType.UNAVAILABLE, unavailable);
    transport.setReachable(ADDRESS, false);

    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(transport.getConnectAttempts(ADDRESS)).toBe(3);
    expect(unavailable).toHaveBeenCalledTimes(1);
    const [error] = unavailable.mock.calls[0];
    expect(error).toBeInstanceOf(DeviceUnavailableError);
    expect(error.message).toBe(`Device ${ADDRESS} unavailable after 3 connection attempts`);
    expect(device.snapshot()).toMatchObject({
      available: false,
      connectionStatus: ConnectionStatus.FAILED,
      state: DeviceState.IDLE,
      dirty: { power: true, brightness: false, color: false }
    });
    expect(scheduler.isQueued(ADDRESS)).toBe(false);
  });

  test('should try an unavailable device again on new intent', async () => {
    const device = createDevice();
    transport.setReachable(ADDRESS, false);
    device.setIntent({ power: true });
    await scheduler.whenIdle();
    expect(device.isAvailable()).toBe(false);

    transport.setReachable(ADDRESS, true);
    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(device.isAvailable()).toBe(true);
    expect(transport.getConnectAttempts(ADDRESS)).toBe(4);
    expect(commands()).toEqual([0x01]);
  });

  test('should grow the reconnect delay with each attempt up to the cap', async () => {
    const device = createDevice(ADDRESS, { reconnectBaseDelay: 1000, maxReconnectDelay: 10000 }, () => 0.5);
    device.setIntent({ power: true });
    await scheduler.whenIdle();

    const delays = [0, 1, 2, 3, 50].map(attempts => device.getReconnectDelay(attempts));

    expect(delays).toEqual([1000, 1200, 1400, 1600, 10000]);
  });

  test('should reconnect and resend after a failed write', async () => {
    const device = createDevice();
    transport.failNextWrites(ADDRESS, 1);

    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(transport.getConnectAttempts(ADDRESS)).toBe(2);
    expect(commands()).toEqual([0x01]);
    expect(device.isDirty()).toBe(false);
  });

  test('should reset the attempt counter only after a successful write', async () => {
    const device = createDevice();
    transport.failNextWrites(ADDRESS, 2);

    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(transport.getConnectAttempts(ADDRESS)).toBe(3);
    expect(commands()).toEqual([0x01]);
    expect(device.snapshot().reconnectAttempts).toBe(0);
    expect(device.isAvailable()).toBe(true);
  });

  test('should mark the device unavailable when every write fails', async () => {
    const device = createDevice();
    const unavailable = jest.fn();
    device.on(DeviceEventType.UNAVAILABLE, unavailable);
    transport.failNextWrites(ADDRESS, Infinity);

    device.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(transport.getConnectAttempts(ADDRESS)).toBe(3);
    expect(commands()).toEqual([]);
    expect(unavailable).toHaveBeenCalledTimes(1);
    const [error] = unavailable.mock.calls[0];
    expect(error).toBeInstanceOf(DeviceUnavailableError);
    expect(error.message).toBe(`Device ${ADDRESS} unavailable after 3 connection attempts`);
    expect(device.snapshot()).toMatchObject({
      available: false,
      connectionStatus: ConnectionStatus.FAILED,
      state: DeviceState.IDLE,
      dirty: { power: true, brightness: false, color: false }
    });
    expect(transport.isConnected(ADDRESS)).toBe(false);
    expect(scheduler.isQueued(ADDRESS)).toBe(false);
  });

  test('should re-send confirmed values while keeping the link alive', async () => {
    const device = createDevice(ADDRESS, { keepAliveTicks: 4 });
    const sent: FrameSentEvent[] = [];
    device.on(DeviceEventType.FRAME_SENT, (event: FrameSentEvent) => sent.push(event));

    device.setIntent({ power: true, brightness: 10 });
    await scheduler.whenIdle();

    expect(sent.map(event => [event.category, event.keepAlive])).toEqual([
      ['power', false],
      ['brightness', false],
      ['power', true],
      ['brightness', true]
    ]);
    expect(transport.getFrames(ADDRESS)[3].payload[0]).toBe(3);
    expect(device.snapshot().pingCounter).toBe(4);
    expect(transport.getConnectAttempts(ADDRESS)).toBe(1);
  });

  test('should send new intent over the kept-alive link', async () => {
    const device = createDevice(ADDRESS, { keepAliveTicks: 50, idleInterval: 20, pingInterval: 1000 });
    device.setIntent({ power: true });
    await waitFor(() => device.snapshot().state === DeviceState.KEEP_ALIVE);

    device.setIntent({ brightness: 255 });
    await waitFor(() => transport.getFrames(ADDRESS).length === 2);

    expect(commands()).toEqual([0x01, 0x04]);
    expect(transport.getFrames(ADDRESS)[1].payload[0]).toBe(100);
    expect(transport.getConnectAttempts(ADDRESS)).toBe(1);

    await expect(scheduler.cancel(ADDRESS)).resolves.toBe(true);
    expect(transport.isConnected(ADDRESS)).toBe(false);
  });

  test('should end the run when the link drops while idle', async () => {
    const device = createDevice(ADDRESS, { keepAliveTicks: 50, idleInterval: 20, pingInterval: 1000 });
    device.setIntent({ power: true });
    await waitFor(() => device.snapshot().state === DeviceState.KEEP_ALIVE);

    expect(transport.dropLink(ADDRESS)).toBe(true);
    await scheduler.whenIdle();

    expect(device.snapshot()).toMatchObject({
      state: DeviceState.IDLE,
      connectionStatus: ConnectionStatus.DISCONNECTED
    });
    expect(pool.snapshot().stale).toEqual([]);
  });

  test('should give up an idle link to a waiting device', async () => {
    setup(1);
    const first = createDevice('AA:BB:CC:DD:EE:01', { keepAliveTicks: 20, pingInterval: 1000 });
    const second = createDevice('AA:BB:CC:DD:EE:02', { keepAliveTicks: 20, pingInterval: 1000 });

    first.setIntent({ power: true });
    second.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(received).toEqual(['01:1', '02:1']);
    expect(transport.getPeakConnections()).toBe(1);
  });

  test('should yield to waiting devices after the send budget', async () => {
    setup(1);
    const first = createDevice('AA:BB:CC:DD:EE:01', { maxSendsPerRun: 1 });
    const second = createDevice('AA:BB:CC:DD:EE:02', { maxSendsPerRun: 1 });

    first.setIntent({ power: true, brightness: 50 });
    second.setIntent({ power: true });
    await scheduler.whenIdle();

    expect(received).toEqual(['01:1', '02:1', '01:4']);
    expect(transport.getConnectAttempts('AA:BB:CC:DD:EE:01')).toBe(2);
  });

  test('should hand a stale slot over when the pool is full', async () => {
    setup(2, 1);
    const first = createDevice('AA:BB:CC:DD:EE:01', { keepAliveTicks: 20, pingInterval: 1000 });
    const second = createDevice('AA:BB:CC:DD:EE:02', { keepAliveTicks: 20, pingInterval: 1000 });

    first.setIntent({ power: true });
    second.setIntent({ power: false });
    await scheduler.whenIdle();

    expect(received).toEqual(['01:1', '02:1']);
    expect(transport.getPeakConnections()).toBe(1);
  });

  test('should stay queued while the slot queue is full', async () => {
    setup(3, 1, 1);
    const addresses = ['AA:BB:CC:DD:EE:01', 'AA:BB:CC:DD:EE:02', 'AA:BB:CC:DD:EE:03'];
    const group = addresses.map(address => createDevice(address));

    group.forEach(device => device.setIntent({ power: true }));
    await scheduler.whenIdle();

    expect(addresses.map(address => commands(address))).toEqual([[0x01], [0x01], [0x01]]);
    expect(transport.getPeakConnections()).toBe(1);
  });

  test('should stop waiting out the backoff when cancelled', async () => {
    const device = createDevice(ADDRESS, { reconnectBaseDelay: 1000, maxReconnectDelay: 10000 });
    transport.setReachable(ADDRESS, false);
    device.setIntent({ power: true });
    await waitFor(() => transport.getConnectAttempts(ADDRESS) === 1);

    const started = Date.now();
    await expect(scheduler.cancel(ADDRESS)).resolves.toBe(true);

    expect(Date.now() - started).toBeLessThan(500);
    expect(device.snapshot().state).toBe(DeviceState.IDLE);
    expect(device.isDirty()).toBe(true);
  });

  test('should publish snapshots as state changes', async () => {
    const device = createDevice();
    const snapshots: DeviceSnapshot[] = [];
    device.on(DeviceEventType.STATE_CHANGED, (snapshot: DeviceSnapshot) => snapshots.push(snapshot));

    device.setIntent({ power: false });
    await scheduler.whenIdle();
    await waitFor(() => snapshots[snapshots.length - 1]?.state === DeviceState.IDLE);

    expect(snapshots[snapshots.length - 1]).toMatchObject({
      power: false,
      connectionStatus: ConnectionStatus.DISCONNECTED,
      available: true
    });
  });
});
