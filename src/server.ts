import { createApp } from './app.js';
import { getScriptDir, getServerPort, getValidationOptions, isQuiet, loadConfig } from './config.js';
import { loadScripts } from './loader.js';

/**
 * Start the server
 */
async function bootstrap() {
  await loadConfig();

  const port = getServerPort();
  const scriptDir = getScriptDir();

  console.log(`Loading scripts from: ${scriptDir}`);
  const data = loadScripts({ scriptDir, validation: getValidationOptions() });

  console.log(`Loaded ${data.scripts.size} of ${data.corpus.size} scripts`);

  if (data.errors.length > 0) {
    console.warn('Errors:', data.errors);
  }

  const app = createApp(data, { quiet: isQuiet() });

  const server = app.listen(port, () => {
    console.log(`Dialogue API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
