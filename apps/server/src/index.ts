import { createApp } from './app.js';
import { loadConfig } from './config.js';

try {
  const config = loadConfig();
  const app = createApp(config);
  app.listen(config.port, () => {
    console.log(`Diagram render server listening on port ${config.port}`);
  });
} catch (error) {
  console.error('Failed to start diagram render server', error);
  process.exit(1);
}
