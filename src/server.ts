import { createLogger } from '@/shared/logging/logger';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

async function main(): Promise<void> {
  const log = createLogger('Server');
  const runtime = createRuntime();
  try {
    await runtime.start();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error('fatal bootstrap error', { message });
    await runtime.stop();
    process.exitCode = 1;
    return;
  }
  registerShutdownHandlers(runtime, log);
}

void main();
