import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const services = await createServices(config);
  const app = createApp(services);

  app.listen(config.port, config.host, () => {
    console.log(`Server is running on port ${config.port}`);
    console.log(`Documents directory: ${config.documentsDir}`);
    console.log(`Health check: http://localhost:${config.port}/api/health`);
  });
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
