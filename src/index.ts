import 'dotenv/config';
import { validateEnv, buildConfig, type AppConfig } from './config/index.js';
import { SERVICE_NAME } from './constants.js';
import { MockInputDevice, MockScreenCapture } from './input/mock-device.js';
import type { DisplaySize, InputDevice, ScreenCapture } from './input/types.js';
import { VncDevice } from './input/vnc-device.js';
import { MonitorHub } from './monitor/hub.js';
import { ActionQueue } from './queue/action-queue.js';
import { RemoteControlServer } from './server/index.js';
import { SessionManager } from './session/manager.js';

// Validate environment variables at startup
const CONFIG = buildConfig(validateEnv());

interface InputBackend {
  device: InputDevice;
  capture: ScreenCapture;
  display: DisplaySize;
  close: () => void;
}

async function createInputBackend(config: AppConfig): Promise<InputBackend> {
  if (config.inputBackend === 'mock') {
    console.warn('[Init] Using the mock input backend - actions will not reach a real display');
    const capture = new MockScreenCapture();
    const display = await capture.displaySize();
    return { device: new MockInputDevice(), capture, display, close: () => {} };
  }

  console.log(`[Init] Connecting to VNC server at ${config.vnc.host}:${config.vnc.port}...`);
  const vnc = new VncDevice(config.vnc);
  const display = await vnc.connect();
  console.log(`[Init] Display ${display.width}x${display.height}`);
  vnc.on('disconnect', () => {
    console.error('[Init] VNC connection lost - actions will fail until restart');
  });
  return { device: vnc, capture: vnc, display, close: () => vnc.disconnect() };
}

async function main(): Promise<void> {
  console.log(`${SERVICE_NAME} starting...\n`);

  const backend = await createInputBackend(CONFIG);

  const monitor = new MonitorHub();
  const sessions = new SessionManager({ durationMs: CONFIG.sessionDurationMs });
  const queue = new ActionQueue({
    device: backend.device,
    capture: backend.capture,
    monitor,
    timeoutMs: CONFIG.actionTimeoutMs,
  });
  queue.start();

  const server = new RemoteControlServer({
    port: CONFIG.port,
    bindAddress: CONFIG.bindAddress,
    allowedOrigins: CONFIG.allowedOrigins,
    queue,
    sessions,
    monitor,
    display: backend.display,
  });
  await server.start();

  console.log(`
  ${SERVICE_NAME} ready
     Backend:   ${CONFIG.inputBackend}
     Session:   ${CONFIG.sessionDurationMs / 1000}s sliding
     Timeout:   ${CONFIG.actionTimeoutMs}ms per action
`);

  // Handle shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[Shutdown] Gracefully shutting down...');
    await server.stop();
    await queue.stop();
    monitor.closeAll();
    backend.close();
    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
