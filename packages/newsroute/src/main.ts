import 'dotenv/config';
import { startServer } from './server';

async function main(): Promise<void> {
  const running = await startServer();

  const shutdown = (signal: NodeJS.Signals) => {
    running
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`Shutdown after ${signal} failed:`, error);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Failed to start newsroute:', error);
  process.exit(1);
});
